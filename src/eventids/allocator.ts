import { type Category, type CategoryRange, CATEGORY_NAMES, blockCapacity } from './categories.js';
import { type AllocationIssue, AllocationError, invariantViolationError } from './errors.js';
import { type EventIdOccurrence, distinctSorted } from './extractor.js';

export interface FileRecord {
  /** Path relative to the project root, forward slashes */
  path: string;
  category: Category;
  /** Sorted distinct event IDs */
  eventIds: number[];
  occurrences: EventIdOccurrence[];
}

export interface FileAssignment {
  path: string;
  category: Category;
  fileIndex: number;
  blockBase: number;
  /** Old ID → new ID for every distinct ID in the file, including unchanged ones */
  mapping: Map<number, number>;
}

/**
 * Plain code-unit ordering, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Number of IDs whose value actually moves.
 */
export function countChanges(assignment: FileAssignment): number {
  let changes = 0;
  for (const [oldId, newId] of assignment.mapping) {
    if (oldId !== newId) changes++;
  }
  return changes;
}

function groupByCategory(records: FileRecord[]): Map<Category, FileRecord[]> {
  const groups = new Map<Category, FileRecord[]>();
  for (const record of records) {
    if (record.eventIds.length === 0) continue;
    const group = groups.get(record.category);
    if (group) group.push(record);
    else groups.set(record.category, [record]);
  }
  return groups;
}

/**
 * Compute the new event ID of every file.
 *
 * Files of a category are ordered by path and take consecutive blocks of
 * `blockSize` IDs starting at the category base; within a file the sorted
 * distinct IDs map to `blockBase + rank`. Files without IDs take no block.
 *
 * Nothing is returned unless every category fits: any block or range
 * overflow raises an {@link AllocationError} listing all of them.
 */
export function allocateEventIds(records: FileRecord[], ranges: Record<Category, CategoryRange>): FileAssignment[] {
  const groups = groupByCategory(records);
  const issues: AllocationIssue[] = [];
  const assignments: FileAssignment[] = [];

  for (const category of CATEGORY_NAMES) {
    const group = groups.get(category);
    if (!group) continue;
    const range = ranges[category];
    const files = [...group].sort((a, b) => comparePaths(a.path, b.path));

    for (let i = 1; i < files.length; i++) {
      if (files[i].path === files[i - 1].path) {
        throw invariantViolationError(`${files[i].path} appears twice in category ${category}`);
      }
    }

    const capacity = blockCapacity(range);
    if (files.length > capacity) {
      issues.push({ kind: 'range-overflow', category, fileCount: files.length, capacity });
    }

    const usedBlocks = new Set<number>();
    files.forEach((file, fileIndex) => {
      const eventIds = distinctSorted(file.eventIds);
      if (eventIds.length > range.blockSize) {
        issues.push({
          kind: 'block-overflow',
          category,
          path: file.path,
          idCount: eventIds.length,
          blockSize: range.blockSize,
        });
        return;
      }

      const blockBase = range.base + fileIndex * range.blockSize;
      if (usedBlocks.has(blockBase)) {
        throw invariantViolationError(`block ${blockBase} of ${category} assigned twice`);
      }
      usedBlocks.add(blockBase);

      const mapping = new Map<number, number>();
      eventIds.forEach((oldId, rank) => {
        mapping.set(oldId, blockBase + rank);
      });
      assignments.push({ path: file.path, category, fileIndex, blockBase, mapping });
    });
  }

  if (issues.length > 0) {
    throw new AllocationError(issues);
  }

  return assignments.sort((a, b) => comparePaths(a.path, b.path));
}
