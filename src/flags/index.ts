export { FlagsEngine, CollectingExperimentSink } from './engine.js';
export type { FlagsEngineOptions, EvaluateAllInput, EvaluationResult } from './engine.js';
export {
  buildEvaluationContext, buildContactCache, buildParentIndex, resolveContact, EMPTY_CONTEXT,
} from './context.js';
export type { EvaluationContext, ContactInfo, ResolvedContact } from './context.js';
export {
  mergeFlags, removeExpiredFlags, sortFlags, buildFlagSetEvents, appendFlagSetEvents, DEFAULT_EXPIRATION_DAYS,
} from './lifecycle.js';
export { createPersistentClassifier, DEFAULT_PERSISTENT_FLAGS, CHILD_SUFFIX } from './persistence.js';
export type { PersistentFlagPredicate } from './persistence.js';
export { getCustomerAbGroup } from './ab-group.js';
export type { AbGroup } from './ab-group.js';
export { toTimeline } from './timeline.js';
export { getDefaultRules, DEFAULT_EXPERIMENT_ID } from './rules/index.js';
export type { RuleRegistryOptions } from './rules/index.js';
