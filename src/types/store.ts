export interface CommitInfo {
  hash: string;
  message: string;
  date: string;
  author: string;
}

export type RunOperation = 'import' | 'resolve' | 'flags' | 'rollback' | 'other';

export interface HistoryEntry {
  commit: CommitInfo;
  operation: RunOperation;
  summary: string;
}
