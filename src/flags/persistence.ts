/** Flag types describing durable state; they never expire by age. */
export const DEFAULT_PERSISTENT_FLAGS: readonly string[] = [
  'active-membership',
  'active-prepaid-pass',
  'has-youth',
];

export const CHILD_SUFFIX = '_child';

export type PersistentFlagPredicate = (flagType: string) => boolean;

/** The `_child` variant of a persistent type is persistent as well. */
export function createPersistentClassifier(flagTypes: readonly string[] = DEFAULT_PERSISTENT_FLAGS): PersistentFlagPredicate {
  const persistent = new Set(flagTypes);
  return (flagType) => {
    if (persistent.has(flagType)) return true;
    return flagType.endsWith(CHILD_SUFFIX) && persistent.has(flagType.slice(0, -CHILD_SUFFIX.length));
  };
}
