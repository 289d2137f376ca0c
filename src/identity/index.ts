export { normalizeEmail, normalizePhone, normalizeName, emailDomain } from './normalize.js';
export {
  similarity, levenshtein, fixDomainTypo, domainsMatchWithTypoTolerance, DOMAIN_TYPO_CORRECTIONS,
} from './similarity.js';
export { FuzzyEmailIndex } from './fuzzy-index.js';
export { IdentityResolver, resolveIdentities, carryOverIds } from './resolver.js';
export type { ResolverOptions, MatchResult, ResolutionResult, ResolutionSummary } from './resolver.js';
