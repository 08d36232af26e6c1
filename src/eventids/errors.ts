import type { Category } from './categories.js';

/**
 * Error codes for logid operations
 */
export const LogIdErrorCode = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  ALLOCATION_FAILED: 'ALLOCATION_FAILED',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
  FILE_UNREADABLE: 'FILE_UNREADABLE',
} as const;

export type LogIdErrorCode = (typeof LogIdErrorCode)[keyof typeof LogIdErrorCode];

export class LogIdError extends Error {
  constructor(
    public code: LogIdErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LogIdError';
  }
}

export type AllocationIssue =
  | {
      kind: 'block-overflow';
      category: Category;
      path: string;
      idCount: number;
      blockSize: number;
    }
  | {
      kind: 'range-overflow';
      category: Category;
      fileCount: number;
      capacity: number;
    };

export function describeAllocationIssue(issue: AllocationIssue): string {
  if (issue.kind === 'block-overflow') {
    return `${issue.path} (${issue.category}) has ${issue.idCount} event IDs but the block size is ${issue.blockSize}`;
  }
  return `${issue.category} needs ${issue.fileCount} blocks but its range only holds ${issue.capacity}`;
}

/**
 * Raised before any file is written when the numbering scheme cannot hold
 * the files it was given.
 */
export class AllocationError extends LogIdError {
  constructor(public readonly issues: AllocationIssue[]) {
    super(
      LogIdErrorCode.ALLOCATION_FAILED,
      `Event ID allocation failed:\n${issues.map((issue) => `  - ${describeAllocationIssue(issue)}`).join('\n')}`
    );
    this.name = 'AllocationError';
  }
}

export function configInvalidError(source: string, reason: string): LogIdError {
  return new LogIdError(LogIdErrorCode.CONFIG_INVALID, `Invalid configuration in ${source}: ${reason}`);
}

export function invariantViolationError(reason: string): LogIdError {
  return new LogIdError(LogIdErrorCode.INVARIANT_VIOLATION, `Internal invariant violated: ${reason}`);
}

export function fileUnreadableError(filePath: string, reason: string): LogIdError {
  return new LogIdError(LogIdErrorCode.FILE_UNREADABLE, `Cannot read ${filePath}: ${reason}`);
}
