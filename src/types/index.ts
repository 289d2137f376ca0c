export type {
  ContactRecord, Customer, Identifier, IdentifierType, MatchConfidence,
  IdentityConflict, FamilyEdge, CustomerSummary,
} from './customer.js';
export { toSummary } from './customer.js';
export type { CustomerEvent, TimelineEvent, EventPayload } from './event.js';
export { FLAG_SET_EVENT, FLAG_SYNCED_EVENT } from './event.js';
export type {
  Flag, FlagCandidate, FlagData, FlagPriority, FlagRule, RuleInput,
  ExperimentEntry, ExperimentSink,
} from './flag.js';
export { PRIORITY_ORDER } from './flag.js';
export type { CommitInfo, HistoryEntry, RunOperation } from './store.js';
