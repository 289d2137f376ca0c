import type { FlagCandidate, FlagData, FlagPriority, FlagRule, RuleInput } from '../../types/index.js';

/**
 * Base class for flag rules. Subclasses implement `evaluate` and build
 * their result with `flag()`.
 */
export abstract class BaseRule implements FlagRule {
  abstract readonly flagType: string;
  abstract readonly description: string;
  abstract readonly priority: FlagPriority;

  abstract evaluate(input: RuleInput): FlagCandidate | null;

  protected flag(input: RuleInput, flagData: FlagData): FlagCandidate {
    return {
      customerId: input.customerId,
      flagType: this.flagType,
      triggeredDate: input.today.toISOString(),
      flagData: { ...flagData, description: this.description },
      priority: this.priority,
    };
  }
}
