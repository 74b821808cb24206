#!/usr/bin/env node

import 'dotenv/config';
import path from 'path';
import chalk from 'chalk';
import { loadConfig } from './openai';
import { runCommitFlow } from './interactive';
import { createConsolePrompter } from './prompts';
import { errorMessage } from './utils';

async function main() {
  try {
    console.log(chalk.green.bold('\nbsp-autocommit — categorized commit assistant\n'));

    const repoArg = process.argv[2];
    if (!repoArg) {
      console.error(chalk.red('Usage: bsp-autocommit <repo-path>'));
      process.exitCode = 1;
      return;
    }

    const config = loadConfig();

    await runCommitFlow({
      repoPath: path.resolve(repoArg),
      config,
      prompter: createConsolePrompter(),
    });
  } catch (err) {
    console.error(chalk.red('bsp-autocommit failed:'), errorMessage(err));
    process.exit(1);
  }
}

void main();
