/**
 * Recognises the numeric event IDs of `[LoggerMessage(...)]` annotations.
 *
 * The same annotation has been written three ways over time:
 *
 *   [LoggerMessage(EventId = 2001, Level = LogLevel.Information, Message = "...")]
 *   [LoggerMessage(2001, LogLevel.Information, "...")]
 *   [LoggerMessage(
 *       2001,
 *       LogLevel.Information,
 *       "...")]
 *
 * Each form has its own recogniser and all of them produce the same
 * occurrence shape, so nothing downstream cares which form was used.
 */

export type AnnotationForm = 'named' | 'positional' | 'positional-multiline';

export interface EventIdOccurrence {
  value: number;
  /** Offset of the first digit */
  start: number;
  /** Offset just past the last digit */
  end: number;
  /** 1-based line number */
  line: number;
  form: AnnotationForm;
}

// Digit separators are allowed: `EventId = 1_000` is 1000.
function parseLiteral(digits: string): number {
  return Number.parseInt(digits.replace(/_/g, ''), 10);
}

interface Recognizer {
  form: AnnotationForm;
  /** The digits must be the last capture and end the match */
  pattern: RegExp;
}

const RECOGNIZERS: Recognizer[] = [
  { form: 'named', pattern: /\bEventId\s*=\s*(\d[\d_]*)\b/ },
  { form: 'positional', pattern: /\[LoggerMessage\([ \t]*(\d[\d_]*)(?=\s*,)/ },
  { form: 'positional-multiline', pattern: /\[LoggerMessage\([ \t]*\r?\n\s*(\d[\d_]*)(?=\s*,)/ },
];

function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

function lineAt(starts: number[], offset: number): number {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (starts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

/**
 * All event ID occurrences in the text, ordered by position.
 */
export function findEventIdOccurrences(text: string): EventIdOccurrence[] {
  const starts = lineStarts(text);
  const byOffset = new Map<number, EventIdOccurrence>();

  for (const recognizer of RECOGNIZERS) {
    const regex = new RegExp(recognizer.pattern.source, 'g');
    for (const match of text.matchAll(regex)) {
      const digits = match[1];
      if (digits === undefined || match.index === undefined) continue;
      const end = match.index + match[0].length;
      const start = end - digits.length;
      if (byOffset.has(start)) continue;
      byOffset.set(start, {
        value: parseLiteral(digits),
        start,
        end,
        line: lineAt(starts, start),
        form: recognizer.form,
      });
    }
  }

  return [...byOffset.values()].sort((a, b) => a.start - b.start);
}

/**
 * Sorted distinct event IDs found in the text.
 */
export function extractEventIds(text: string): number[] {
  return distinctSorted(findEventIdOccurrences(text).map((o) => o.value));
}

export function distinctSorted(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}
