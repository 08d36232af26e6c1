export {
  CATEGORY_NAMES,
  type Category,
  type CategoryRange,
  type CategoryRule,
  type CategoryTable,
  DEFAULT_BLOCK_SIZE,
  DEFAULT_CATEGORY,
  DEFAULT_RANGES,
  DEFAULT_RULES,
  blockCapacity,
  classifyFile,
  defaultCategoryTable,
  findOverlappingRanges,
  isCategory,
  isInRange,
  rangeEnd,
} from './categories.js';
export {
  type AnnotationForm,
  type EventIdOccurrence,
  distinctSorted,
  extractEventIds,
  findEventIdOccurrences,
} from './extractor.js';
export { type FileAssignment, type FileRecord, allocateEventIds, comparePaths, countChanges } from './allocator.js';
export { type FileRewriteResult, type RewriteResult, rewriteContent, rewriteFile } from './rewriter.js';
export {
  type Collision,
  type RangeViolation,
  type UniquenessReport,
  checkRanges,
  verifyUniqueness,
} from './verifier.js';
export { type Inventory, type SkippedFile, buildInventory, toRelativePath } from './inventory.js';
export { type NormalizeResult, normalizeAnnotations, normalizeFile } from './normalizer.js';
export { type MappingEntry, formatMappingReport, mappingEntries, writeMappingReport } from './report.js';
export { type CategorySummary, summarizeCategories } from './summary.js';
export {
  type ApplyResult,
  type FailedWrite,
  type RenumberPlan,
  applyRenumbering,
  discoverFiles,
  planRenumbering,
  verifyPlan,
} from './pipeline.js';
export {
  type AllocationIssue,
  AllocationError,
  LogIdError,
  LogIdErrorCode,
  describeAllocationIssue,
} from './errors.js';
