import { Command } from '@oclif/core';
import chalk from 'chalk';
import { AllocationError, type FileAssignment, allocateEventIds, buildInventory, summarizeCategories } from '../eventids/index.js';
import { ProjectFlags, RootArgs, failWith, openProject, outputJsonOrPlain, tableSeparator } from './_shared/index.js';

export default class Ranges extends Command {
  static override description = 'Show the category table with reserved ranges and how much of each is used';

  static override examples = ['<%= config.bin %> ranges ./src', '<%= config.bin %> ranges ./src --json'];

  static override args = RootArgs;

  static override flags = ProjectFlags;

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Ranges);

    const project = await openProject(this, args.root, {
      config: flags.config,
      exclude: flags.exclude,
      json: flags.json,
    });
    const inventory = await buildInventory(project.root, project.files, project.config.table);

    let assignments: FileAssignment[];
    try {
      assignments = allocateEventIds(inventory.records, project.config.table.ranges);
    } catch (error) {
      if (!(error instanceof AllocationError)) failWith(this, error, flags.json);
      // Still show the table; the overflow itself is reported below.
      assignments = [];
      this.warn(chalk.yellow(error.message));
    }

    const summaries = summarizeCategories(assignments, project.config.table.ranges);

    outputJsonOrPlain(this, flags.json, { root: project.root, categories: summaries }, () => {
      const header = `${'Category'.padEnd(16)}${'Range'.padEnd(14)}${'Block'.padStart(6)}${'Files'.padStart(8)}${'IDs'.padStart(7)}  Used`;
      this.log(chalk.bold(header));
      this.log(chalk.gray(tableSeparator(header.length + 12)));
      for (const s of summaries) {
        const used = s.usedEnd === null ? '-' : `${s.base}-${s.usedEnd}`;
        const files = `${s.fileCount}/${s.capacity}`;
        this.log(
          `${s.category.padEnd(16)}${`${s.base}-${s.end}`.padEnd(14)}${String(s.blockSize).padStart(6)}${files.padStart(8)}${String(s.eventIdCount).padStart(7)}  ${used}`
        );
      }
      if (flags.verbose) {
        this.log('');
        this.log(chalk.gray(`Files scanned: ${inventory.scannedCount}, with event IDs: ${inventory.records.length}`));
      }
    });
  }
}
