import fs from 'node:fs/promises';
import path from 'node:path';
import { type FileAssignment, comparePaths } from './allocator.js';

export interface MappingEntry {
  path: string;
  category: string;
  oldId: number;
  newId: number;
}

/**
 * Changed IDs only, files in path order and IDs ascending within a file.
 */
export function mappingEntries(assignments: FileAssignment[]): MappingEntry[] {
  const entries: MappingEntry[] = [];
  for (const assignment of [...assignments].sort((a, b) => comparePaths(a.path, b.path))) {
    const oldIds = [...assignment.mapping.keys()].sort((a, b) => a - b);
    for (const oldId of oldIds) {
      const newId = assignment.mapping.get(oldId);
      if (newId === undefined || newId === oldId) continue;
      entries.push({ path: assignment.path, category: assignment.category, oldId, newId });
    }
  }
  return entries;
}

export function formatMappingReport(assignments: FileAssignment[], generatedAt: Date): string {
  const lines = [
    '# EventId mapping report',
    `# Generated: ${generatedAt.toISOString()}`,
    '# Format: File|Category|OldEventId|NewEventId',
    '',
  ];
  for (const entry of mappingEntries(assignments)) {
    lines.push(`${entry.path}|${entry.category}|${entry.oldId}|${entry.newId}`);
  }
  return `${lines.join('\n')}\n`;
}

export async function writeMappingReport(
  reportPath: string,
  assignments: FileAssignment[],
  generatedAt = new Date()
): Promise<void> {
  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, formatMappingReport(assignments, generatedAt), 'utf-8');
}
