import type { FileAssignment } from './allocator.js';
import { type Category, type CategoryRange, CATEGORY_NAMES, blockCapacity, rangeEnd } from './categories.js';

export interface CategorySummary {
  category: Category;
  base: number;
  end: number;
  blockSize: number;
  capacity: number;
  fileCount: number;
  eventIdCount: number;
  /** Last ID of the last allocated block, or null when the category is empty */
  usedEnd: number | null;
}

export function summarizeCategories(
  assignments: FileAssignment[],
  ranges: Record<Category, CategoryRange>
): CategorySummary[] {
  return CATEGORY_NAMES.map((category) => {
    const range = ranges[category];
    const files = assignments.filter((a) => a.category === category);
    const lastBlock = files.reduce<number | null>(
      (max, a) => (max === null || a.blockBase > max ? a.blockBase : max),
      null
    );
    return {
      category,
      base: range.base,
      end: rangeEnd(range),
      blockSize: range.blockSize,
      capacity: blockCapacity(range),
      fileCount: files.length,
      eventIdCount: files.reduce((sum, a) => sum + a.mapping.size, 0),
      usedEnd: lastBlock === null ? null : lastBlock + range.blockSize - 1,
    };
  }).sort((a, b) => a.base - b.base);
}
