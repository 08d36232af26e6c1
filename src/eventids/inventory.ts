import path from 'node:path';
import { readSourceFile } from '../utils/source-reader.js';
import type { FileRecord } from './allocator.js';
import { type CategoryTable, classifyFile } from './categories.js';
import { distinctSorted, findEventIdOccurrences } from './extractor.js';

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface Inventory {
  /** Files containing at least one event ID, in path order */
  records: FileRecord[];
  skipped: SkippedFile[];
  scannedCount: number;
}

export function toRelativePath(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

/**
 * Read, classify and extract every file. Unreadable files are recorded in
 * `skipped` and left out of the run.
 */
export async function buildInventory(
  root: string,
  files: string[],
  table: Pick<CategoryTable, 'rules' | 'defaultCategory'>
): Promise<Inventory> {
  const records: FileRecord[] = [];
  const skipped: SkippedFile[] = [];

  for (const filePath of [...files].sort()) {
    const relativePath = toRelativePath(root, filePath);
    const source = await readSourceFile(filePath);
    if (!source.ok) {
      skipped.push({ path: relativePath, reason: source.error });
      continue;
    }

    const occurrences = findEventIdOccurrences(source.content);
    if (occurrences.length === 0) continue;

    records.push({
      path: relativePath,
      category: classifyFile(relativePath, table),
      eventIds: distinctSorted(occurrences.map((o) => o.value)),
      occurrences,
    });
  }

  return { records, skipped, scannedCount: files.length };
}
