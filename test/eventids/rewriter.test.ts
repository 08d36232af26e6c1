import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { LogIdError } from '../../src/eventids/errors.js';
import { rewriteContent, rewriteFile } from '../../src/eventids/rewriter.js';
import { createProject, readFile, removeProject } from '../helpers/project.js';

describe('rewriteContent', () => {
  it('replaces IDs in all three forms', () => {
    const text = [
      '[LoggerMessage(EventId = 1, Level = LogLevel.Information, Message = "a")]',
      '[LoggerMessage(2, LogLevel.Warning, "b")]',
      '[LoggerMessage(',
      '    3,',
      '    LogLevel.Error,',
      '    "c")]',
    ].join('\n');

    const result = rewriteContent(
      text,
      new Map([
        [1, 2000],
        [2, 2001],
        [3, 2002],
      ])
    );

    expect(result.replaced).toBe(3);
    expect(result.content).toBe(
      [
        '[LoggerMessage(EventId = 2000, Level = LogLevel.Information, Message = "a")]',
        '[LoggerMessage(2001, LogLevel.Warning, "b")]',
        '[LoggerMessage(',
        '    2002,',
        '    LogLevel.Error,',
        '    "c")]',
      ].join('\n')
    );
  });

  it('never touches longer numbers that contain an old value', () => {
    const text = [
      '[LoggerMessage(EventId = 12, Level = LogLevel.Information, Message = "Retry 1234 times")]',
      'private const int Limit = 1234;',
      '[LoggerMessage(EventId = 123, Level = LogLevel.Debug, Message = "x")]',
    ].join('\n');

    const { content } = rewriteContent(
      text,
      new Map([
        [12, 5000],
        [123, 5001],
      ])
    );

    expect(content).toBe(
      [
        '[LoggerMessage(EventId = 5000, Level = LogLevel.Information, Message = "Retry 1234 times")]',
        'private const int Limit = 1234;',
        '[LoggerMessage(EventId = 5001, Level = LogLevel.Debug, Message = "x")]',
      ].join('\n')
    );
  });

  it('moves every value once even when mappings chain', () => {
    const text = 'EventId = 5,\nEventId = 2000,';
    const { content } = rewriteContent(
      text,
      new Map([
        [5, 2000],
        [2000, 2001],
      ])
    );
    expect(content).toBe('EventId = 2000,\nEventId = 2001,');
  });

  it('rewrites every repetition of a value', () => {
    const { content, replaced } = rewriteContent('EventId = 3; EventId = 3;', new Map([[3, 2200]]));
    expect(content).toBe('EventId = 2200; EventId = 2200;');
    expect(replaced).toBe(2);
  });

  it('replaces a literal written with digit separators', () => {
    const text = '[LoggerMessage(EventId = 1_000, Level = LogLevel.Information, Message = "x")]';
    expect(rewriteContent(text, new Map([[1000, 2000]]))).toEqual({
      content: '[LoggerMessage(EventId = 2000, Level = LogLevel.Information, Message = "x")]',
      replaced: 1,
    });
  });

  it('returns the original text when nothing changes', () => {
    const text = 'EventId = 2000,';
    const result = rewriteContent(text, new Map([[2000, 2000]]));
    expect(result).toEqual({ content: text, replaced: 0 });
  });
});

describe('rewriteFile', () => {
  let root: string;

  afterEach(() => {
    removeProject(root);
  });

  it('writes the file when IDs move', async () => {
    root = createProject({ 'Audio/Player.cs': 'EventId = 5,' });
    const result = await rewriteFile(path.join(root, 'Audio', 'Player.cs'), new Map([[5, 2000]]));
    expect(result).toEqual({ written: true, replaced: 1 });
    expect(readFile(root, 'Audio/Player.cs')).toBe('EventId = 2000,');
  });

  it('leaves the modification time alone on a no-op', async () => {
    root = createProject({ 'Audio/Player.cs': 'EventId = 2000,' });
    const filePath = path.join(root, 'Audio', 'Player.cs');
    const past = new Date('2020-01-01T00:00:00Z');
    fs.utimesSync(filePath, past, past);

    const result = await rewriteFile(filePath, new Map([[2000, 2000]]));

    expect(result).toEqual({ written: false, replaced: 0 });
    expect(fs.statSync(filePath).mtime.getTime()).toBe(past.getTime());
  });

  it('keeps a UTF-8 byte-order mark', async () => {
    root = createProject({});
    const filePath = path.join(root, 'Bom.cs');
    fs.writeFileSync(filePath, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('EventId = 1,')]));

    await rewriteFile(filePath, new Map([[1, 1000]]));

    const bytes = fs.readFileSync(filePath);
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.subarray(3).toString('utf-8')).toBe('EventId = 1000,');
  });

  it('throws a LogIdError for a missing file', async () => {
    root = createProject({});
    await expect(rewriteFile(path.join(root, 'Missing.cs'), new Map([[1, 2]]))).rejects.toBeInstanceOf(LogIdError);
  });
});
