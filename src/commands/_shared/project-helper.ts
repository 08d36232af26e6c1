import type { Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Command } from '@oclif/core';
import chalk from 'chalk';
import { type ResolvedConfig, loadConfig } from '../../config/config.js';
import { AllocationError, LogIdError, discoverFiles } from '../../eventids/index.js';
import { formatAllocationIssue } from './output.js';

export interface Project {
  root: string;
  config: ResolvedConfig;
  /** Absolute paths of the files to process, sorted */
  files: string[];
}

/**
 * Resolve the project root from the argument value.
 * Priority: explicit argument > LOGID_ROOT env var > current directory.
 */
export function resolveRoot(rootArg: string | undefined): string {
  return path.resolve(rootArg ?? process.env.LOGID_ROOT ?? '.');
}

/**
 * Translate a domain error into a labelled command failure (exit code 2).
 * With `json` the error is printed as a JSON document instead of coloured lines.
 * Anything else is rethrown untouched.
 */
export function failWith(command: Command, error: unknown, json = false): never {
  if (error instanceof LogIdError && json) {
    const issues = error instanceof AllocationError ? error.issues : [];
    command.log(JSON.stringify({ error: { code: error.code, message: error.message, issues } }, null, 2));
    command.error(error.message, { exit: 2 });
  }
  if (error instanceof AllocationError) {
    command.log(chalk.red('Allocation failed; no files were written:'));
    for (const issue of error.issues) command.log(formatAllocationIssue(issue));
    command.error(chalk.red('Increase the block size or span of the affected categories and re-run.'), { exit: 2 });
  }
  if (error instanceof LogIdError) {
    command.error(chalk.red(error.message), { exit: 2 });
  }
  throw error;
}

/**
 * Check the root, load its configuration and list the files to process.
 */
export async function openProject(
  command: Command,
  rootArg: string | undefined,
  options: { config?: string; exclude?: string[]; json?: boolean } = {}
): Promise<Project> {
  const root = resolveRoot(rootArg);

  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch {
    command.error(chalk.red(`Directory "${root}" does not exist`), { exit: 2 });
  }
  if (!stat.isDirectory()) {
    command.error(chalk.red(`"${root}" is not a directory`), { exit: 2 });
  }

  let config: ResolvedConfig;
  try {
    config = await loadConfig(root, options.config);
  } catch (error) {
    failWith(command, error, options.json);
  }

  const files = await discoverFiles(root, config, options.exclude ?? []);
  return { root, config, files };
}
