import { promises as fs } from 'fs';
import path from 'path';
import { runGitCommand, splitNullSeparated } from './utils';
import type { ChangeSet, UntrackedMode } from './types';

/**
 * True only for the top level of a work tree. Name listings are relative to
 * the top level, so a subdirectory would make every pathspec miss.
 */
export async function isGitRepository(repoPath: string): Promise<boolean> {
  let realPath: string;
  try {
    const stat = await fs.stat(repoPath);
    if (!stat.isDirectory()) return false;
    realPath = await fs.realpath(repoPath);
  } catch {
    return false;
  }

  try {
    const topLevel = await runGitCommand(['rev-parse', '--show-toplevel'], repoPath);
    return path.resolve(topLevel.trim()) === path.resolve(realPath);
  } catch {
    return false;
  }
}

export async function getChangedFiles(repoPath: string): Promise<string[]> {
  const unstaged = splitNullSeparated(await runGitCommand(['diff', '--name-only', '-z'], repoPath));
  const staged = splitNullSeparated(await runGitCommand(['diff', '--cached', '--name-only', '-z'], repoPath));
  return Array.from(new Set([...unstaged, ...staged]));
}

export async function getUntrackedFiles(repoPath: string): Promise<string[]> {
  return splitNullSeparated(await runGitCommand(['ls-files', '--others', '--exclude-standard', '-z'], repoPath));
}

export async function collectChanges(repoPath: string, mode: UntrackedMode): Promise<ChangeSet> {
  const changed = await getChangedFiles(repoPath);
  const untracked = mode === 'stage' ? await getUntrackedFiles(repoPath) : [];
  return { changed, untracked };
}

export async function getDiffForFiles(repoPath: string, files: string[]): Promise<string> {
  // An empty pathspec would diff the whole tree.
  if (files.length === 0) {
    return '';
  }
  const staged = await runGitCommand(['diff', '--cached', '--', ...files], repoPath);
  const unstaged = await runGitCommand(['diff', '--', ...files], repoPath);
  return `${staged}\n${unstaged}`;
}

export async function stageFiles(repoPath: string, files: string[]): Promise<void> {
  if (files.length === 0) return;
  await runGitCommand(['add', '--', ...files], repoPath);
}

/**
 * Stages `files` and commits only those paths, leaving anything else in the
 * index for a later commit.
 */
export async function commitFiles(repoPath: string, files: string[], message: string): Promise<void> {
  await stageFiles(repoPath, files);
  await runGitCommand(['commit', '-m', message, '--', ...files], repoPath);
}

export async function pushChanges(repoPath: string, remote?: string): Promise<void> {
  await runGitCommand(remote ? ['push', remote] : ['push'], repoPath);
}
