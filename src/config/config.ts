import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  CATEGORY_NAMES,
  type CategoryTable,
  defaultCategoryTable,
  findOverlappingRanges,
} from '../eventids/categories.js';
import { configInvalidError } from '../eventids/errors.js';
import { DEFAULT_EXTENSIONS } from '../utils/file-scanner.js';

export const CONFIG_FILE_NAME = 'logid.config.json';
export const DEFAULT_REPORT_FILE = 'eventid-mappings.txt';

const CategoryOverrideSchema = z
  .object({
    base: z.number().int().nonnegative().optional(),
    span: z.number().int().positive().optional(),
    blockSize: z.number().int().positive().optional(),
    keywords: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const LogIdConfigSchema = z
  .object({
    extensions: z.array(z.string().min(1)).min(1).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    blockSize: z.number().int().positive().optional(),
    reportFile: z.string().min(1).optional(),
    defaultCategory: z.enum(CATEGORY_NAMES).optional(),
    categories: z.record(z.enum(CATEGORY_NAMES), CategoryOverrideSchema).optional(),
  })
  .strict();

export type LogIdConfig = z.infer<typeof LogIdConfigSchema>;

export interface ResolvedConfig {
  /** Where the config came from, or null for built-in defaults */
  source: string | null;
  extensions: string[];
  exclude: string[];
  reportFile: string;
  table: CategoryTable;
}

/**
 * Merge a parsed config over the built-in category table and check that the
 * result is still a valid numbering scheme.
 */
export function resolveConfig(config: LogIdConfig, source: string | null = null): ResolvedConfig {
  const table = defaultCategoryTable();
  const label = source ?? 'built-in defaults';

  if (config.defaultCategory) table.defaultCategory = config.defaultCategory;

  for (const name of CATEGORY_NAMES) {
    const range = table.ranges[name];
    if (config.blockSize !== undefined) range.blockSize = config.blockSize;

    const override = config.categories?.[name];
    if (!override) continue;
    if (override.base !== undefined) range.base = override.base;
    if (override.span !== undefined) range.span = override.span;
    if (override.blockSize !== undefined) range.blockSize = override.blockSize;
    if (override.keywords) {
      const keywords = override.keywords;
      const rule = table.rules.find((r) => r.category === name);
      if (rule) rule.keywords = [...keywords];
      else table.rules.push({ category: name, keywords: [...keywords] });
    }
  }

  for (const name of CATEGORY_NAMES) {
    const range = table.ranges[name];
    if (range.blockSize > range.span) {
      throw configInvalidError(label, `${name} block size ${range.blockSize} exceeds its span ${range.span}`);
    }
  }

  const overlaps = findOverlappingRanges(table.ranges);
  if (overlaps.length > 0) {
    const pairs = overlaps.map((o) => `${o.first}/${o.second}`).join(', ');
    throw configInvalidError(label, `category ranges overlap: ${pairs}`);
  }

  return {
    source,
    extensions: config.extensions ?? [...DEFAULT_EXTENSIONS],
    exclude: config.exclude ?? [],
    reportFile: config.reportFile ?? DEFAULT_REPORT_FILE,
    table,
  };
}

export function parseConfig(raw: string, source: string): LogIdConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw configInvalidError(source, error instanceof Error ? error.message : String(error));
  }

  const result = LogIdConfigSchema.safeParse(json);
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw configInvalidError(source, reasons.join('; '));
  }
  return result.data;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the configuration for a project root.
 * Priority: explicit path > LOGID_CONFIG env var > <root>/logid.config.json > built-in defaults.
 */
export async function loadConfig(root: string, explicitPath?: string): Promise<ResolvedConfig> {
  const requested = explicitPath ?? process.env.LOGID_CONFIG;
  let configPath: string | null = null;

  if (requested) {
    configPath = path.resolve(requested);
    if (!(await fileExists(configPath))) {
      throw configInvalidError(configPath, 'file does not exist');
    }
  } else {
    const candidate = path.join(root, CONFIG_FILE_NAME);
    if (await fileExists(candidate)) configPath = candidate;
  }

  if (!configPath) return resolveConfig({});

  const raw = await fs.readFile(configPath, 'utf-8');
  return resolveConfig(parseConfig(raw, configPath), configPath);
}
