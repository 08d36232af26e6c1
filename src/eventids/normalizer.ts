import fs from 'node:fs/promises';
import { readSourceFile } from '../utils/source-reader.js';
import { fileUnreadableError } from './errors.js';

// [LoggerMessage(2001, LogLevel.Warning, "text")] on one line or spread over several
const POSITIONAL_ANNOTATION =
  /\[LoggerMessage\(\s*(\d[\d_]*)\s*,\s*((?:[\w.]+\.)?LogLevel\.\w+)\s*,\s*("(?:[^"\\\r\n]|\\.)*")\s*\)\]/g;

const INDENT_STEP = '    ';

export interface NormalizeResult {
  content: string;
  converted: number;
}

function indentationAt(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  const leading = /^[ \t]*/.exec(text.slice(lineStart, offset));
  return leading ? leading[0] : '';
}

/**
 * Rewrite positional `[LoggerMessage(...)]` annotations into the named form:
 *
 *   [LoggerMessage(
 *       EventId = 2001,
 *       Level = LogLevel.Warning,
 *       Message = "text"
 *   )]
 *
 * Level and message text are kept verbatim.
 */
export function normalizeAnnotations(text: string): NormalizeResult {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  let converted = 0;

  const content = text.replace(
    POSITIONAL_ANNOTATION,
    (_match: string, eventId: string, level: string, message: string, offset: number) => {
      converted++;
      const indent = indentationAt(text, offset);
      const inner = indent + INDENT_STEP;
      return [
        '[LoggerMessage(',
        `${inner}EventId = ${eventId},`,
        `${inner}Level = ${level},`,
        `${inner}Message = ${message}`,
        `${indent})]`,
      ].join(eol);
    }
  );

  return { content, converted };
}

export interface FileNormalizeResult {
  written: boolean;
  converted: number;
}

export async function normalizeFile(filePath: string, options: { dryRun?: boolean } = {}): Promise<FileNormalizeResult> {
  const source = await readSourceFile(filePath);
  if (!source.ok) {
    throw fileUnreadableError(filePath, source.error);
  }

  const { content, converted } = normalizeAnnotations(source.content);
  if (converted === 0 || options.dryRun) {
    return { written: false, converted };
  }

  await fs.writeFile(filePath, content, 'utf-8');
  return { written: true, converted };
}
