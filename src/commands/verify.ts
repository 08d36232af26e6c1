import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { buildInventory, checkRanges, verifyUniqueness } from '../eventids/index.js';
import {
  ProjectFlags,
  RootArgs,
  formatCollision,
  formatSkipped,
  openProject,
  outputJsonOrPlain,
} from './_shared/index.js';

export default class Verify extends Command {
  static override description = 'Check that event IDs are unique across files and sit inside their category ranges';

  static override examples = [
    '<%= config.bin %> verify ./src',
    '<%= config.bin %> verify ./src --no-ranges',
    '<%= config.bin %> verify ./src --json',
  ];

  static override args = RootArgs;

  static override flags = {
    ...ProjectFlags,
    ranges: Flags.boolean({
      description: 'Also check every ID against its category range',
      default: true,
      allowNo: true,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Verify);

    const project = await openProject(this, args.root, {
      config: flags.config,
      exclude: flags.exclude,
      json: flags.json,
    });
    const uniqueness = await verifyUniqueness(project.root, project.files);
    const inventory = await buildInventory(project.root, project.files, project.config.table);
    const violations = flags.ranges ? checkRanges(inventory.records, project.config.table.ranges) : [];

    const ok = uniqueness.collisions.length === 0 && violations.length === 0;

    outputJsonOrPlain(
      this,
      flags.json,
      {
        root: project.root,
        ok,
        filesScanned: uniqueness.filesScanned,
        uniqueCount: uniqueness.uniqueCount,
        collisions: uniqueness.collisions,
        rangeViolations: violations,
        unreadable: uniqueness.unreadable,
      },
      () => {
        this.log(chalk.blue('Verifying event IDs...'));
        for (const skipped of uniqueness.unreadable) this.warn(formatSkipped(skipped));
        for (const collision of uniqueness.collisions) this.log(formatCollision(collision));
        for (const v of violations) {
          this.log(
            chalk.red(
              `Out of range: event ID ${v.eventId} in ${v.path} should be in ${v.category} range (${v.expected.min}-${v.expected.max})`
            )
          );
        }
        if (flags.verbose) {
          this.log(chalk.gray(`  Files scanned: ${uniqueness.filesScanned}`));
          this.log(chalk.gray(`  Files with event IDs: ${inventory.records.length}`));
        }
        if (ok) {
          this.log(chalk.green(`✓ All ${uniqueness.uniqueCount} event IDs are unique and in range`));
        } else {
          if (uniqueness.collisions.length > 0) {
            this.log(chalk.red(`✗ Found ${uniqueness.collisions.length} colliding event ID(s)`));
          }
          if (violations.length > 0) {
            this.log(chalk.red(`✗ Found ${violations.length} event ID(s) outside their category range`));
          }
        }
      }
    );

    if (!ok) {
      this.exit(1);
    }
  }
}
