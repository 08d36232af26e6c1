import path from 'node:path';
import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import {
  type ApplyResult,
  type Category,
  type CategoryRange,
  type FileAssignment,
  type RenumberPlan,
  type UniquenessReport,
  applyRenumbering,
  countChanges,
  planRenumbering,
  summarizeCategories,
  verifyPlan,
  writeMappingReport,
} from '../eventids/index.js';
import {
  ProjectFlags,
  RootArgs,
  WriteFlags,
  confirm,
  failWith,
  promptStreams,
  formatCollision,
  formatSkipped,
  openProject,
} from './_shared/index.js';

const PREVIEW_LIMIT = 10;

type RunStatus = 'up-to-date' | 'dry-run' | 'cancelled' | 'applied';

function describeChanges(assignment: FileAssignment): Array<{ from: number; to: number }> {
  const changes: Array<{ from: number; to: number }> = [];
  for (const [from, to] of assignment.mapping) {
    if (from !== to) changes.push({ from, to });
  }
  return changes.sort((a, b) => a.from - b.from);
}

export default class Renumber extends Command {
  static override description =
    'Renumber LoggerMessage event IDs so every file owns a disjoint block inside its category range';

  static override examples = [
    '<%= config.bin %> renumber ./src',
    '<%= config.bin %> renumber ./src --dry-run',
    '<%= config.bin %> renumber ./src -i --report ./eventid-mappings.txt',
    '<%= config.bin %> renumber ./src -e "**/Generated/**" --json',
  ];

  static override args = RootArgs;

  static override flags = {
    ...ProjectFlags,
    ...WriteFlags,
    report: Flags.string({
      description: 'Mapping report path, relative to the project root (default: eventid-mappings.txt)',
    }),
    'no-report': Flags.boolean({
      description: 'Do not write a mapping report',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Renumber);
    const isJson = flags.json;

    const project = await openProject(this, args.root, {
      config: flags.config,
      exclude: flags.exclude,
      json: flags.json,
    });

    if (!isJson) {
      this.log(chalk.blue('Event ID renumbering'));
      this.log(chalk.white(`  Root: ${project.root}`));
      if (project.config.source) this.log(chalk.white(`  Config: ${project.config.source}`));
      this.log(chalk.white(`  Files scanned: ${project.files.length}`));
      this.log('');
    }

    let plan: RenumberPlan;
    try {
      plan = await planRenumbering(project.root, project.files, project.config);
    } catch (error) {
      failWith(this, error, isJson);
    }

    if (!isJson) {
      for (const skipped of plan.inventory.skipped) this.warn(formatSkipped(skipped));
      this.log(chalk.white(`  Files with event IDs: ${plan.inventory.records.length}`));
      this.renderPreview(plan, flags.verbose);
    }

    let status: RunStatus;
    let applied: ApplyResult | null = null;
    let reportPath: string | null = null;

    const question = `Apply event ID changes to ${plan.pending.length} file(s)?`;
    if (plan.pending.length === 0) {
      status = 'up-to-date';
    } else if (flags['dry-run']) {
      status = 'dry-run';
    } else if (flags.interactive && !(await confirm(question, promptStreams(isJson)))) {
      status = 'cancelled';
    } else {
      status = 'applied';
      applied = await applyRenumbering(plan);
      if (!flags['no-report'] && applied.written.length > 0) {
        const written = new Set(applied.written);
        reportPath = path.resolve(project.root, flags.report ?? project.config.reportFile);
        await writeMappingReport(reportPath, plan.pending.filter((a) => written.has(a.path)));
      }
    }

    const verification = status === 'up-to-date' || status === 'applied' ? await verifyPlan(plan) : null;

    if (isJson) {
      this.log(
        JSON.stringify(
          {
            root: project.root,
            status,
            filesScanned: project.files.length,
            filesWithEventIds: plan.inventory.records.length,
            skipped: plan.inventory.skipped,
            pending: plan.pending.map((a) => ({
              path: a.path,
              category: a.category,
              fileIndex: a.fileIndex,
              blockBase: a.blockBase,
              changes: describeChanges(a),
            })),
            written: applied?.written ?? [],
            failed: applied?.failed ?? [],
            report: reportPath,
            verification,
          },
          null,
          2
        )
      );
    } else {
      this.renderOutcome(plan, status, applied, reportPath, verification, project.config.table.ranges);
    }

    if (verification && verification.collisions.length > 0) {
      this.exit(1);
    }
  }

  private renderPreview(plan: RenumberPlan, verbose: boolean): void {
    this.log('');
    if (plan.pending.length === 0) {
      this.log(chalk.green('No event ID changes needed - already organized.'));
      return;
    }

    this.log(chalk.blue('Pending event ID changes:'));
    const shown = verbose ? plan.pending : plan.pending.slice(0, PREVIEW_LIMIT);
    for (const assignment of shown) {
      this.log(chalk.white(`  ${assignment.path} (${assignment.category}): ${countChanges(assignment)} change(s)`));
      if (verbose) {
        for (const { from, to } of describeChanges(assignment)) {
          this.log(chalk.gray(`    ${from} → ${to}`));
        }
      }
    }
    if (shown.length < plan.pending.length) {
      this.log(chalk.gray(`  ... and ${plan.pending.length - shown.length} more file(s)`));
    }
    this.log(chalk.white(`Total: ${plan.pending.length} file(s) will change`));
  }

  private renderOutcome(
    plan: RenumberPlan,
    status: RunStatus,
    applied: ApplyResult | null,
    reportPath: string | null,
    verification: UniquenessReport | null,
    ranges: Record<Category, CategoryRange>
  ): void {
    this.log('');
    if (status === 'dry-run') {
      this.log(chalk.yellow('Dry run: no files were written.'));
      return;
    }
    if (status === 'cancelled') {
      this.log(chalk.yellow('Event ID renumbering cancelled by user.'));
      return;
    }

    if (applied) {
      for (const failure of applied.failed) {
        this.warn(chalk.red(`Write failed for ${failure.path}: ${failure.error}`));
      }
      this.log(
        chalk.green(`✓ Updated ${applied.written.length}/${plan.pending.length} file(s), ${applied.replaced} occurrence(s)`)
      );
      if (reportPath) this.log(chalk.green(`  Mapping saved to: ${reportPath}`));
    }

    this.log('');
    this.log(chalk.blue('Category ranges:'));
    for (const summary of summarizeCategories(plan.assignments, ranges)) {
      if (summary.fileCount === 0) continue;
      this.log(
        chalk.white(`  ${summary.category}: ${summary.fileCount} file(s) (${summary.base}-${summary.usedEnd ?? summary.base})`)
      );
    }

    if (!verification) return;
    this.log('');
    if (verification.collisions.length > 0) {
      for (const collision of verification.collisions) this.log(formatCollision(collision));
      this.log(chalk.red(`✗ Found ${verification.collisions.length} colliding event ID(s)`));
    } else {
      this.log(chalk.green(`✓ All ${verification.uniqueCount} event IDs are unique`));
    }
  }
}
