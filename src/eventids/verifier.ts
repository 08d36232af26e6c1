import { readSourceFile } from '../utils/source-reader.js';
import type { FileRecord } from './allocator.js';
import { type Category, type CategoryRange, isInRange, rangeEnd } from './categories.js';
import { extractEventIds } from './extractor.js';
import { type SkippedFile, toRelativePath } from './inventory.js';

export interface Collision {
  eventId: number;
  /** Relative paths, sorted */
  files: string[];
}

export interface UniquenessReport {
  filesScanned: number;
  uniqueCount: number;
  collisions: Collision[];
  unreadable: SkippedFile[];
}

/**
 * Re-read every file from disk and find event IDs used by more than one
 * file. Repeating an ID inside a single file is not a collision.
 */
export async function verifyUniqueness(root: string, files: string[]): Promise<UniquenessReport> {
  const owners = new Map<number, Set<string>>();
  const unreadable: SkippedFile[] = [];

  for (const filePath of files) {
    const relativePath = toRelativePath(root, filePath);
    const source = await readSourceFile(filePath);
    if (!source.ok) {
      unreadable.push({ path: relativePath, reason: source.error });
      continue;
    }
    for (const eventId of extractEventIds(source.content)) {
      const set = owners.get(eventId);
      if (set) set.add(relativePath);
      else owners.set(eventId, new Set([relativePath]));
    }
  }

  const collisions: Collision[] = [];
  for (const [eventId, set] of owners) {
    if (set.size > 1) collisions.push({ eventId, files: [...set].sort() });
  }
  collisions.sort((a, b) => a.eventId - b.eventId);

  return {
    filesScanned: files.length,
    uniqueCount: owners.size,
    collisions,
    unreadable,
  };
}

export interface RangeViolation {
  path: string;
  category: Category;
  eventId: number;
  expected: { min: number; max: number };
}

/**
 * Event IDs that sit outside the reserved range of their file's category.
 */
export function checkRanges(records: FileRecord[], ranges: Record<Category, CategoryRange>): RangeViolation[] {
  const violations: RangeViolation[] = [];
  for (const record of records) {
    const range = ranges[record.category];
    for (const eventId of record.eventIds) {
      if (!isInRange(eventId, range)) {
        violations.push({
          path: record.path,
          category: record.category,
          eventId,
          expected: { min: range.base, max: rangeEnd(range) },
        });
      }
    }
  }
  return violations;
}
