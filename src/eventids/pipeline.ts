import path from 'node:path';
import type { ResolvedConfig } from '../config/config.js';
import { scanDirectory } from '../utils/file-scanner.js';
import { type FileAssignment, allocateEventIds, countChanges } from './allocator.js';
import { type Inventory, buildInventory } from './inventory.js';
import { rewriteFile } from './rewriter.js';
import { type UniquenessReport, verifyUniqueness } from './verifier.js';

export interface RenumberPlan {
  root: string;
  /** Every file the scan looked at, absolute */
  files: string[];
  inventory: Inventory;
  assignments: FileAssignment[];
  /** Assignments that move at least one ID */
  pending: FileAssignment[];
}

export interface FailedWrite {
  path: string;
  error: string;
}

export interface ApplyResult {
  written: string[];
  unchanged: string[];
  failed: FailedWrite[];
  replaced: number;
}

export async function discoverFiles(root: string, config: ResolvedConfig, extraExcludes: string[] = []): Promise<string[]> {
  return scanDirectory(root, {
    extensions: config.extensions,
    exclude: [...config.exclude, ...extraExcludes],
  });
}

/**
 * Classify, extract and allocate. Read-only: an allocation failure throws
 * before anything has been written.
 */
export async function planRenumbering(root: string, files: string[], config: ResolvedConfig): Promise<RenumberPlan> {
  const inventory = await buildInventory(root, files, config.table);
  const assignments = allocateEventIds(inventory.records, config.table.ranges);
  return {
    root,
    files,
    inventory,
    assignments,
    pending: assignments.filter((a) => countChanges(a) > 0),
  };
}

/**
 * Rewrite every pending file. A failure on one file is recorded and the
 * remaining files are still processed.
 */
export async function applyRenumbering(plan: RenumberPlan): Promise<ApplyResult> {
  const result: ApplyResult = { written: [], unchanged: [], failed: [], replaced: 0 };

  for (const assignment of plan.pending) {
    const absolutePath = path.join(plan.root, assignment.path);
    try {
      const { written, replaced } = await rewriteFile(absolutePath, assignment.mapping);
      if (written) result.written.push(assignment.path);
      else result.unchanged.push(assignment.path);
      result.replaced += replaced;
    } catch (error) {
      result.failed.push({ path: assignment.path, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return result;
}

export async function verifyPlan(plan: RenumberPlan): Promise<UniquenessReport> {
  return verifyUniqueness(plan.root, plan.files);
}

