import path from 'node:path';
import { glob } from 'glob';

export const DEFAULT_IGNORE_PATTERNS = [
  '**/bin/**',
  '**/obj/**',
  '**/.git/**',
  '**/.vs/**',
  '**/node_modules/**',
  '**/packages/**',
];

export const DEFAULT_EXTENSIONS = ['cs'];

export interface ScanOptions {
  extensions?: string[];
  /** Replaces the default ignore list */
  ignorePatterns?: string[];
  /** Added on top of the ignore list */
  exclude?: string[];
}

export function buildScanPattern(extensions: string[]): string {
  const cleaned = extensions.map((ext) => ext.replace(/^\./, ''));
  return cleaned.length === 1 ? `**/*.${cleaned[0]}` : `**/*.{${cleaned.join(',')}}`;
}

export async function scanDirectory(directory: string, options: ScanOptions = {}): Promise<string[]> {
  const absoluteDir = path.resolve(directory);
  const ignorePatterns = [...(options.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS), ...(options.exclude ?? [])];

  const files = await glob(buildScanPattern(options.extensions ?? DEFAULT_EXTENSIONS), {
    cwd: absoluteDir,
    absolute: true,
    ignore: ignorePatterns,
    nodir: true,
  });

  return files.sort();
}
