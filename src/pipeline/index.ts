export { PipelineRunner, mergeExperimentEntries } from './runner.js';
export type { ResolveRunResult, FlagRunResult } from './runner.js';
