import { describe, expect, it } from 'vitest';
import { distinctSorted, extractEventIds, findEventIdOccurrences } from '../../src/eventids/extractor.js';

describe('extractor', () => {
  describe('findEventIdOccurrences', () => {
    it('recognises the named form', () => {
      const text = '[LoggerMessage(EventId = 2001, Level = LogLevel.Information, Message = "Started")]';
      const occurrences = findEventIdOccurrences(text);
      expect(occurrences).toEqual([{ value: 2001, start: 25, end: 29, line: 1, form: 'named' }]);
      expect(text.slice(25, 29)).toBe('2001');
    });

    it('recognises the named form without spaces around =', () => {
      expect(findEventIdOccurrences('EventId=7,')).toEqual([{ value: 7, start: 8, end: 9, line: 1, form: 'named' }]);
    });

    it('recognises the single-line positional form', () => {
      const text = '    [LoggerMessage(42, LogLevel.Warning, "Low volume")]';
      expect(findEventIdOccurrences(text)).toEqual([{ value: 42, start: 19, end: 21, line: 1, form: 'positional' }]);
    });

    it('recognises the multi-line positional form', () => {
      const text = ['[LoggerMessage(', '    314,', '    LogLevel.Error,', '    "Failed")]'].join('\n');
      expect(findEventIdOccurrences(text)).toEqual([
        { value: 314, start: 20, end: 23, line: 2, form: 'positional-multiline' },
      ]);
    });

    it('accepts CRLF line endings in the multi-line form', () => {
      const text = '[LoggerMessage(\r\n  9,\r\n  LogLevel.Debug,\r\n  "x")]';
      const [occurrence] = findEventIdOccurrences(text);
      expect(occurrence.value).toBe(9);
      expect(occurrence.form).toBe('positional-multiline');
      expect(occurrence.line).toBe(2);
    });

    it('finds all three forms in one file, in position order', () => {
      const text = [
        '[LoggerMessage(EventId = 12, Level = LogLevel.Information, Message = "a")]',
        'partial void A();',
        '[LoggerMessage(5, LogLevel.Warning, "b")]',
        'partial void B();',
        '[LoggerMessage(',
        '    8,',
        '    LogLevel.Error,',
        '    "c")]',
        'partial void C();',
      ].join('\n');

      const occurrences = findEventIdOccurrences(text);
      expect(occurrences.map((o) => [o.value, o.form, o.line])).toEqual([
        [12, 'named', 1],
        [5, 'positional', 3],
        [8, 'positional-multiline', 6],
      ]);
    });

    it('ignores numbers that are not event IDs', () => {
      const text = 'var timeout = 1234;\nLogger.Log(12, "x");\n[Route("api/5")]';
      expect(findEventIdOccurrences(text)).toEqual([]);
    });

    it('does not match identifiers that merely end in EventId', () => {
      expect(findEventIdOccurrences('var lastEventId = 10;')).toEqual([]);
    });

    it('does not report a positional argument that is not a number', () => {
      expect(findEventIdOccurrences('[LoggerMessage(LogLevel.Information, "x")]')).toEqual([]);
    });
  });

  describe('extractEventIds', () => {
    it('returns sorted distinct values', () => {
      const text = [
        'EventId = 9',
        'EventId = 5',
        '[LoggerMessage(5, LogLevel.Warning, "dup")]',
        '[LoggerMessage(',
        '  1,',
        '  LogLevel.Error, "x")]',
      ].join('\n');
      expect(extractEventIds(text)).toEqual([1, 5, 9]);
    });

    it('returns an empty list for text without annotations', () => {
      expect(extractEventIds('namespace Empty;')).toEqual([]);
    });

    it('parses leading zeros as decimal', () => {
      expect(extractEventIds('EventId = 0042')).toEqual([42]);
    });

    it('reads literals with digit separators', () => {
      const text = [
        '[LoggerMessage(EventId = 1_000, Level = LogLevel.Information, Message = "a")]',
        '[LoggerMessage(2_001, LogLevel.Warning, "b")]',
        '[LoggerMessage(',
        '  3_0_02,',
        '  LogLevel.Error, "c")]',
      ].join('\n');
      expect(extractEventIds(text)).toEqual([1000, 2001, 3002]);
    });
  });

  describe('distinctSorted', () => {
    it('collapses duplicates and sorts numerically', () => {
      expect(distinctSorted([100, 9, 9, 20])).toEqual([9, 20, 100]);
    });
  });
});
