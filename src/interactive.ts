import ora from 'ora';
import chalk from 'chalk';
import type { Category, CategoryOutcome, CommitContext, CommitRunSummary } from './types';
import { CATEGORY_ORDER, classifyFiles } from './classify';
import { assembleCommitMessage, vocabularyFor } from './message';
import { analyzeDiff } from './openai';
import { collectChanges, commitFiles, getDiffForFiles, isGitRepository, pushChanges, stageFiles } from './git';
import { confirm, resolveAnalysis } from './prompts';
import { errorMessage, renderBox, renderSimpleTable } from './utils';

export async function processCategory(
  context: CommitContext,
  category: Category,
  files: string[]
): Promise<CategoryOutcome> {
  const { repoPath, config, prompter } = context;
  const label = category.toUpperCase();

  let diff: string;
  try {
    diff = await getDiffForFiles(repoPath, files);
  } catch (err) {
    console.error(chalk.red(`Could not read diff for ${label}: ${errorMessage(err)}`));
    return 'failed';
  }

  if (!diff.trim()) {
    console.log(chalk.gray(`No diff for ${label}, skipping.`));
    return 'no-diff';
  }

  const vocabulary = vocabularyFor(config.policy);
  const spinner = ora(`Analyzing ${label} changes (${files.length} files)...`).start();
  const analysis = await analyzeDiff(config, diff, category, vocabulary);
  if (!analysis) {
    spinner.fail(`Failed to analyze ${category} changes, skipping.`);
    return 'no-analysis';
  }
  spinner.succeed(`Analyzed ${label} changes.`);

  const fields = await resolveAnalysis(prompter, analysis, vocabulary, config.strictInput);
  const message = assembleCommitMessage(fields);

  console.log(chalk.blue('\nProposed commit message:'));
  console.log(renderBox(message));

  if (!(await confirm(prompter, `Commit ${label} changes?`))) {
    console.log(chalk.gray(`Skipped ${label}.`));
    return 'declined';
  }

  const commitSpinner = ora(`Committing ${label}...`).start();
  try {
    await commitFiles(repoPath, files, message);
    commitSpinner.succeed(`Committed: ${message.split('\n')[0]}`);
    return 'committed';
  } catch (err) {
    commitSpinner.fail(`Error during commit: ${errorMessage(err)}`);
    return 'failed';
  }
}

export async function offerPush(context: CommitContext): Promise<boolean> {
  if (!(await confirm(context.prompter, '\nAll commits done. Push now?'))) {
    return false;
  }

  const spinner = ora('Pushing...').start();
  try {
    await pushChanges(context.repoPath, context.config.remote);
    spinner.succeed('Successfully pushed changes.');
    return true;
  } catch (err) {
    spinner.fail(`Error during push: ${errorMessage(err)}`);
    return false;
  }
}

function printClassification(buckets: Record<Category, string[]>): void {
  const rows = CATEGORY_ORDER.filter((category) => buckets[category].length > 0).map((category) => [
    category,
    String(buckets[category].length),
    buckets[category].join(', '),
  ]);
  console.log(
    renderSimpleTable(['Category', 'Files', 'Paths'], rows, { columnMaxWidths: [10, 5], headerStyle: chalk.bold })
  );
}

export async function runCommitFlow(context: CommitContext): Promise<CommitRunSummary> {
  const { repoPath, config } = context;
  const summary: CommitRunSummary = { outcomes: {}, uncategorized: [], pushed: false };

  if (!(await isGitRepository(repoPath))) {
    console.error(chalk.red(`Error: ${repoPath} is not a valid git repository`));
    return summary;
  }

  const changes = await collectChanges(repoPath, config.untracked);
  if (changes.untracked.length > 0) {
    console.log(chalk.cyan(`\nFound new files:\n${changes.untracked.join('\n')}`));
    await stageFiles(repoPath, changes.untracked);
    console.log(chalk.dim('Added new files to staging.'));
  }

  const files = Array.from(new Set([...changes.changed, ...changes.untracked]));
  if (files.length === 0) {
    console.log(chalk.green('No changes to commit.'));
    return summary;
  }

  const { buckets, uncategorized } = classifyFiles(files, config.policy);
  summary.uncategorized = uncategorized;
  console.log(chalk.cyan(`\nFound ${files.length} changed files:`));
  printClassification(buckets);

  if (uncategorized.length > 0) {
    console.warn(
      chalk.yellow(
        `${uncategorized.length} files match no category and will not be committed:\n${uncategorized.join('\n')}`
      )
    );
  }

  for (const category of CATEGORY_ORDER) {
    const bucket = buckets[category];
    if (bucket.length === 0) continue;

    console.log(chalk.yellow(`\n--- ${category.toUpperCase()} ---`));
    summary.outcomes[category] = await processCategory(context, category, bucket);
  }

  summary.pushed = await offerPush(context);
  return summary;
}
