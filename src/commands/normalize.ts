import path from 'node:path';
import { Command } from '@oclif/core';
import chalk from 'chalk';
import { normalizeFile, toRelativePath } from '../eventids/index.js';
import { ProjectFlags, RootArgs, WriteFlags, confirm, openProject, promptStreams } from './_shared/index.js';

interface NormalizedFile {
  path: string;
  converted: number;
}

export default class Normalize extends Command {
  static override description =
    'Rewrite positional [LoggerMessage(id, level, "message")] annotations into the named EventId/Level/Message form';

  static override examples = [
    '<%= config.bin %> normalize ./src',
    '<%= config.bin %> normalize ./src --dry-run',
    '<%= config.bin %> normalize ./src -i',
  ];

  static override args = RootArgs;

  static override flags = {
    ...ProjectFlags,
    ...WriteFlags,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Normalize);
    const isJson = flags.json;

    const project = await openProject(this, args.root, {
      config: flags.config,
      exclude: flags.exclude,
      json: flags.json,
    });

    // First pass never writes, so the prompt can show the full picture.
    const candidates: NormalizedFile[] = [];
    const skipped: Array<{ path: string; reason: string }> = [];
    for (const filePath of project.files) {
      const relativePath = toRelativePath(project.root, filePath);
      try {
        const { converted } = await normalizeFile(filePath, { dryRun: true });
        if (converted > 0) candidates.push({ path: relativePath, converted });
      } catch (error) {
        skipped.push({ path: relativePath, reason: error instanceof Error ? error.message : String(error) });
      }
    }

    const total = candidates.reduce((sum, c) => sum + c.converted, 0);

    if (!isJson) {
      this.log(chalk.blue('Normalizing LoggerMessage annotations...'));
      for (const s of skipped) this.warn(chalk.yellow(`Skipped ${s.path}: ${s.reason}`));
      if (candidates.length === 0) {
        this.log(chalk.green('All annotations already use the named format.'));
      }
      for (const c of candidates) {
        this.log(chalk.white(`  ${c.path}: ${c.converted} positional annotation(s)`));
      }
    }

    let written: string[] = [];
    let status: 'up-to-date' | 'dry-run' | 'cancelled' | 'applied' = 'up-to-date';

    const question = `Normalize ${total} annotation(s) in ${candidates.length} file(s)?`;
    if (candidates.length > 0) {
      if (flags['dry-run']) {
        status = 'dry-run';
      } else if (flags.interactive && !(await confirm(question, promptStreams(isJson)))) {
        status = 'cancelled';
      } else {
        status = 'applied';
        written = await this.applyAll(project.root, candidates);
      }
    }

    if (isJson) {
      this.log(JSON.stringify({ root: project.root, status, files: candidates, written, skipped }, null, 2));
      return;
    }

    if (status === 'dry-run') this.log(chalk.yellow('Dry run: no files were written.'));
    if (status === 'cancelled') this.log(chalk.yellow('Normalization cancelled by user.'));
    if (status === 'applied') {
      this.log(chalk.green(`✓ Normalized ${total} annotation(s) in ${written.length} file(s)`));
    }
  }

  private async applyAll(root: string, candidates: NormalizedFile[]): Promise<string[]> {
    const written: string[] = [];
    for (const candidate of candidates) {
      try {
        const result = await normalizeFile(path.join(root, candidate.path));
        if (result.written) written.push(candidate.path);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.warn(chalk.red(`Write failed for ${candidate.path}: ${message}`));
      }
    }
    return written;
  }
}
