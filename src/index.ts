export { run } from '@oclif/core';
export * from './eventids/index.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_REPORT_FILE,
  LogIdConfigSchema,
  type LogIdConfig,
  type ResolvedConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
} from './config/config.js';
export { DEFAULT_EXTENSIONS, DEFAULT_IGNORE_PATTERNS, type ScanOptions, scanDirectory } from './utils/file-scanner.js';
