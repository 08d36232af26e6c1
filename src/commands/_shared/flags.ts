import { Args, Flags } from '@oclif/core';

/**
 * Shared argument and flag definitions for consistent CLI experience across commands.
 */
export const RootArgs = {
  root: Args.string({
    description: 'Project root to scan (default: $LOGID_ROOT or the current directory)',
    required: false,
  }),
};

export const ProjectFlags = {
  config: Flags.string({
    char: 'c',
    description: 'Path to a logid.config.json file',
  }),
  exclude: Flags.string({
    char: 'e',
    description: 'Glob pattern of files to leave out (repeatable)',
    multiple: true,
  }),
  json: Flags.boolean({
    description: 'Output as JSON',
    default: false,
  }),
  verbose: Flags.boolean({
    description: 'Show detailed progress',
    default: false,
  }),
};

export const WriteFlags = {
  'dry-run': Flags.boolean({
    description: 'Show what would change without writing any file',
    default: false,
  }),
  interactive: Flags.boolean({
    char: 'i',
    description: 'Ask for confirmation before writing files',
    default: false,
  }),
};
