export { PipelineStore } from './pipeline-store.js';
export type { CommitTables, TableWrite, RegistryWrite, FlagRunWrite } from './pipeline-store.js';
export { GitOps } from './git-ops.js';
export * from './file-layout.js';
export * from './schemas.js';
