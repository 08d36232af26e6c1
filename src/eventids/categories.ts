export const CATEGORY_NAMES = [
  'Core',
  'Audio',
  'KNX',
  'MQTT',
  'Web',
  'Infrastructure',
  'Performance',
  'Notifications',
  'Testing',
] as const;

export type Category = (typeof CATEGORY_NAMES)[number];

export const DEFAULT_CATEGORY: Category = 'Core';

export const DEFAULT_BLOCK_SIZE = 100;

/**
 * Reserved numeric range of one category: `[base, base + span)`.
 * Every file in the category receives its own `blockSize`-wide slice.
 */
export interface CategoryRange {
  category: Category;
  base: number;
  span: number;
  blockSize: number;
}

/**
 * A classification rule. Rules are evaluated in order and the first one
 * whose keyword occurs in the relative path wins.
 */
export interface CategoryRule {
  category: Category;
  keywords: string[];
}

export interface CategoryTable {
  ranges: Record<Category, CategoryRange>;
  rules: CategoryRule[];
  defaultCategory: Category;
}

export const DEFAULT_RANGES: Record<Category, CategoryRange> = {
  Core: { category: 'Core', base: 1000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  Audio: { category: 'Audio', base: 2000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  KNX: { category: 'KNX', base: 3000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  MQTT: { category: 'MQTT', base: 4000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  Web: { category: 'Web', base: 5000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  Infrastructure: { category: 'Infrastructure', base: 6000, span: 2000, blockSize: DEFAULT_BLOCK_SIZE },
  Performance: { category: 'Performance', base: 8000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  Testing: { category: 'Testing', base: 9000, span: 1000, blockSize: DEFAULT_BLOCK_SIZE },
  Notifications: { category: 'Notifications', base: 10000, span: 6000, blockSize: DEFAULT_BLOCK_SIZE },
};

export const DEFAULT_RULES: CategoryRule[] = [
  { category: 'Audio', keywords: ['Audio', 'Media', 'Snapcast', 'LibVLC', 'Player', 'Sound'] },
  { category: 'KNX', keywords: ['KNX', 'Knx', 'Building', 'Automation'] },
  { category: 'MQTT', keywords: ['MQTT', 'Mqtt', 'Message', 'Broker', 'Topic'] },
  { category: 'Web', keywords: ['Web', 'Http', 'API', 'Api/', 'Controller', 'Endpoint', 'Health'] },
  { category: 'Performance', keywords: ['Performance', 'Metrics', 'Monitor', 'Stats'] },
  { category: 'Notifications', keywords: ['Notification', 'Event', 'Handler', 'Publisher'] },
  { category: 'Infrastructure', keywords: ['Infrastructure', 'Host', 'Extension', 'Service', 'Integration', 'Storage'] },
  { category: 'Testing', keywords: ['Test', 'Mock', 'Fake', 'Stub'] },
];

export function defaultCategoryTable(): CategoryTable {
  return {
    ranges: structuredClone(DEFAULT_RANGES),
    rules: structuredClone(DEFAULT_RULES),
    defaultCategory: DEFAULT_CATEGORY,
  };
}

export function isCategory(value: string): value is Category {
  return (CATEGORY_NAMES as readonly string[]).includes(value);
}

/**
 * Map a project-relative path to its category. Backslashes are folded to
 * forward slashes first so rules such as `Api/` behave the same on Windows.
 */
export function classifyFile(relativePath: string, table: Pick<CategoryTable, 'rules' | 'defaultCategory'>): Category {
  const normalized = relativePath.replace(/\\/g, '/');
  for (const rule of table.rules) {
    if (rule.keywords.some((keyword) => normalized.includes(keyword))) {
      return rule.category;
    }
  }
  return table.defaultCategory;
}

export function rangeEnd(range: CategoryRange): number {
  return range.base + range.span - 1;
}

export function isInRange(value: number, range: CategoryRange): boolean {
  return value >= range.base && value < range.base + range.span;
}

/**
 * Number of files a category can hold before its blocks run past the range.
 */
export function blockCapacity(range: CategoryRange): number {
  return Math.floor(range.span / range.blockSize);
}

export interface RangeOverlap {
  first: Category;
  second: Category;
}

/**
 * Pairs of categories whose reserved ranges intersect.
 */
export function findOverlappingRanges(ranges: Record<Category, CategoryRange>): RangeOverlap[] {
  const sorted = CATEGORY_NAMES.map((name) => ranges[name]).sort((a, b) => a.base - b.base);
  const overlaps: RangeOverlap[] = [];
  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length; j++) {
      const a = sorted[i];
      const b = sorted[j];
      if (b.base >= a.base + a.span) break;
      overlaps.push({ first: a.category, second: b.category });
    }
  }
  return overlaps;
}
