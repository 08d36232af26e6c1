import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import type { FileRecord } from '../../src/eventids/allocator.js';
import { defaultCategoryTable } from '../../src/eventids/categories.js';
import { checkRanges, verifyUniqueness } from '../../src/eventids/verifier.js';
import { createProject, csFile, removeProject } from '../helpers/project.js';

describe('verifyUniqueness', () => {
  let root: string;

  afterEach(() => {
    removeProject(root);
  });

  function filesOf(relativePaths: string[]): string[] {
    return relativePaths.map((p) => path.join(root, ...p.split('/')));
  }

  it('reports no collisions when every file owns its IDs', async () => {
    root = createProject({
      'Audio/a.cs': csFile('A', [2000, 2001, 2000]),
      'Audio/b.cs': csFile('B', [2100]),
      'Audio/c.cs': csFile('C', [2200, 2200, 2200]),
    });

    const report = await verifyUniqueness(root, filesOf(['Audio/a.cs', 'Audio/b.cs', 'Audio/c.cs']));

    expect(report).toEqual({ filesScanned: 3, uniqueCount: 4, collisions: [], unreadable: [] });
  });

  it('lists IDs shared between files', async () => {
    root = createProject({
      'Web/Api.cs': csFile('Api', [5000, 5001]),
      'Web/Health.cs': csFile('Health', [5001]),
      'Domain/Zone.cs': csFile('Zone', [5001, 1000]),
    });

    const report = await verifyUniqueness(root, filesOf(['Web/Api.cs', 'Web/Health.cs', 'Domain/Zone.cs']));

    expect(report.uniqueCount).toBe(3);
    expect(report.collisions).toEqual([{ eventId: 5001, files: ['Domain/Zone.cs', 'Web/Api.cs', 'Web/Health.cs'] }]);
  });

  it('reads from disk rather than trusting earlier state', async () => {
    root = createProject({ 'a.cs': csFile('A', [1000]), 'b.cs': csFile('B', [1100]) });
    const files = filesOf(['a.cs', 'b.cs']);
    expect((await verifyUniqueness(root, files)).collisions).toEqual([]);

    fs.writeFileSync(files[1], csFile('B', [1000]));

    expect((await verifyUniqueness(root, files)).collisions).toEqual([{ eventId: 1000, files: ['a.cs', 'b.cs'] }]);
  });

  it('lists unreadable files separately', async () => {
    root = createProject({ 'a.cs': csFile('A', [1000]) });
    fs.writeFileSync(path.join(root, 'bad.cs'), Buffer.from([0xff, 0xfe, 0x00]));

    const report = await verifyUniqueness(root, filesOf(['a.cs', 'bad.cs']));

    expect(report.uniqueCount).toBe(1);
    expect(report.unreadable).toEqual([{ path: 'bad.cs', reason: 'not valid UTF-8' }]);
  });
});

describe('checkRanges', () => {
  const ranges = defaultCategoryTable().ranges;

  function record(path: string, category: FileRecord['category'], eventIds: number[]): FileRecord {
    return { path, category, eventIds, occurrences: [] };
  }

  it('accepts IDs inside the category range', () => {
    expect(checkRanges([record('Audio/a.cs', 'Audio', [2000, 2999])], ranges)).toEqual([]);
  });

  it('flags IDs outside the category range', () => {
    expect(checkRanges([record('Audio/a.cs', 'Audio', [1999, 2500, 3000])], ranges)).toEqual([
      { path: 'Audio/a.cs', category: 'Audio', eventId: 1999, expected: { min: 2000, max: 2999 } },
      { path: 'Audio/a.cs', category: 'Audio', eventId: 3000, expected: { min: 2000, max: 2999 } },
    ]);
  });
});
