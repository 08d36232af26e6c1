export { RootArgs, ProjectFlags, WriteFlags } from './flags.js';
export {
  outputJsonOrPlain,
  tableSeparator,
  formatSkipped,
  formatCollision,
  formatAllocationIssue,
} from './output.js';
export { confirm, promptStreams, type PromptStreams } from './prompt.js';
export { openProject, resolveRoot, failWith, type Project } from './project-helper.js';
