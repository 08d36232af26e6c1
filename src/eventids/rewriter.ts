import fs from 'node:fs/promises';
import { readSourceFile } from '../utils/source-reader.js';
import { fileUnreadableError } from './errors.js';
import { findEventIdOccurrences } from './extractor.js';

export interface RewriteResult {
  content: string;
  /** Occurrences whose digits changed */
  replaced: number;
}

/**
 * Substitute every recognised event ID that has a mapping.
 *
 * Works in one pass over the original occurrences, so a chain such as
 * 5 → 2000 and 2000 → 2001 moves each value exactly once. Only the digits
 * of an annotation are touched; other numbers in the file are left alone.
 */
export function rewriteContent(text: string, mapping: ReadonlyMap<number, number>): RewriteResult {
  const parts: string[] = [];
  let cursor = 0;
  let replaced = 0;

  for (const occurrence of findEventIdOccurrences(text)) {
    const next = mapping.get(occurrence.value);
    if (next === undefined || next === occurrence.value) continue;
    parts.push(text.slice(cursor, occurrence.start), String(next));
    cursor = occurrence.end;
    replaced++;
  }

  if (replaced === 0) return { content: text, replaced: 0 };
  parts.push(text.slice(cursor));
  return { content: parts.join(''), replaced };
}

export interface FileRewriteResult {
  written: boolean;
  replaced: number;
}

/**
 * Apply a mapping to a file in place. The file is only written when its
 * text changes, so a no-op run leaves modification times untouched.
 */
export async function rewriteFile(filePath: string, mapping: ReadonlyMap<number, number>): Promise<FileRewriteResult> {
  const source = await readSourceFile(filePath);
  if (!source.ok) {
    throw fileUnreadableError(filePath, source.error);
  }

  const { content, replaced } = rewriteContent(source.content, mapping);
  if (content === source.content) {
    return { written: false, replaced: 0 };
  }

  await fs.writeFile(filePath, content, 'utf-8');
  return { written: true, replaced };
}
