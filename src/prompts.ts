import Enquirer from 'enquirer';
import chalk from 'chalk';
import type { AnalysisResult, CommitFields, Prompter, Vocabulary } from './types';
import { isUndetermined } from './message';

const AFFIRMATIVE = ['y', 'yes'];

export function createConsolePrompter(): Prompter {
  return {
    async input(message: string): Promise<string> {
      const resp = await Enquirer.prompt<{ value: string }>({
        type: 'input',
        name: 'value',
        message,
      });
      return resp.value;
    },
  };
}

export function isAffirmative(answer: string): boolean {
  return AFFIRMATIVE.includes(answer.trim().toLowerCase());
}

export async function confirm(prompter: Prompter, message: string): Promise<boolean> {
  return isAffirmative(await prompter.input(`${message} (y/n)`));
}

/**
 * Accepts a 1-based index or an exact choice. Outside strict mode any other
 * non-empty text is taken verbatim.
 */
export function pickChoice(answer: string, choices: readonly string[], strict: boolean): string | undefined {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    const index = Number(trimmed);
    if (index >= 1 && index <= choices.length) {
      return choices[index - 1];
    }
  }
  if (choices.includes(trimmed)) {
    return trimmed;
  }
  if (!strict && trimmed !== '') {
    return trimmed;
  }
  return undefined;
}

export async function manualSelect(
  prompter: Prompter,
  label: string,
  choices: readonly string[],
  strict: boolean
): Promise<string> {
  while (true) {
    console.log(chalk.cyan(`\n${label}`));
    choices.forEach((choice, index) => {
      console.log(chalk.dim(`  ${index + 1}. ${choice}`));
    });

    const answer = await prompter.input(strict ? 'Enter number or value:' : 'Enter number, value, or type your own:');
    const picked = pickChoice(answer, choices, strict);
    if (picked !== undefined) {
      return picked;
    }
    console.log(chalk.yellow('Invalid input, please try again.'));
  }
}

async function askText(prompter: Prompter, message: string): Promise<string> {
  while (true) {
    const answer = (await prompter.input(message)).trim();
    if (answer) return answer;
    console.log(chalk.yellow('A value is required.'));
  }
}

export function splitDetails(line: string): string[] {
  return line
    .split(',')
    .map((d) => d.trim())
    .filter(Boolean);
}

export async function resolveAnalysis(
  prompter: Prompter,
  analysis: AnalysisResult,
  vocabulary: Vocabulary,
  strict: boolean
): Promise<CommitFields> {
  const cpu = isUndetermined(analysis.cpu)
    ? await manualSelect(prompter, 'Enter CPU type (or choose):', vocabulary.cpus, strict)
    : analysis.cpu.trim();
  const machine = isUndetermined(analysis.machine)
    ? await manualSelect(prompter, 'Enter machine type (or choose):', vocabulary.machines, strict)
    : analysis.machine.trim();
  const type = isUndetermined(analysis.type)
    ? await manualSelect(prompter, 'Enter change type (or choose):', vocabulary.types, strict)
    : analysis.type.trim();
  const title = analysis.title.trim() || (await askText(prompter, 'Enter commit title:'));

  let details = analysis.details;
  if (details.length === 0) {
    details = splitDetails(await prompter.input('Enter details for commit message (comma separated):'));
  }

  return { cpu, machine, type, title, details };
}
