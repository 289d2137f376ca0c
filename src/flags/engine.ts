import type {
  CustomerEvent, ExperimentEntry, ExperimentSink, Flag, FlagCandidate, FlagRule, TimelineEvent,
} from '../types/index.js';
import { logger } from '../utils/index.js';
import { EMPTY_CONTEXT, resolveContact, type EvaluationContext } from './context.js';
import {
  buildFlagSetEvents, DEFAULT_EXPIRATION_DAYS, mergeFlags, removeExpiredFlags, sortFlags,
} from './lifecycle.js';
import { CHILD_SUFFIX, createPersistentClassifier, type PersistentFlagPredicate } from './persistence.js';
import { getDefaultRules } from './rules/index.js';
import { toTimeline } from './timeline.js';

export interface FlagsEngineOptions {
  rules?: FlagRule[];
  isPersistent?: PersistentFlagPredicate;
  expirationDays?: number;
}

export interface EvaluateAllInput {
  events: CustomerEvent[];
  today: Date;
  context?: EvaluationContext;
  previousFlags?: Flag[];
  experimentSink?: ExperimentSink;
}

export interface EvaluationResult {
  /** Merged, unexpired flags: the new flags table. */
  flags: Flag[];
  /** Flags raised by this run. */
  newFlags: Flag[];
  /** One `flag_set` event per new flag that survived merge and expiry. */
  flagSetEvents: CustomerEvent[];
  customersEvaluated: number;
  customersFlagged: number;
  expired: number;
}

/** Collects experiment entries in memory for the caller to persist. */
export class CollectingExperimentSink implements ExperimentSink {
  readonly entries: ExperimentEntry[] = [];

  record(entry: ExperimentEntry): void {
    this.entries.push(entry);
  }
}

export class FlagsEngine {
  readonly rules: readonly FlagRule[];
  private isPersistent: PersistentFlagPredicate;
  private expirationDays: number;

  constructor(options: FlagsEngineOptions = {}) {
    this.rules = options.rules ?? getDefaultRules();
    this.isPersistent = options.isPersistent ?? createPersistentClassifier();
    this.expirationDays = options.expirationDays ?? DEFAULT_EXPIRATION_DAYS;
  }

  /** Run every rule, in order, against one customer's timeline. */
  evaluateCustomer(
    customerId: string,
    events: Array<CustomerEvent | TimelineEvent>,
    today: Date,
    context: EvaluationContext = EMPTY_CONTEXT,
  ): FlagCandidate[] {
    const timeline = toTimeline(events);
    const contact = resolveContact(context, customerId);

    const flags: FlagCandidate[] = [];
    for (const rule of this.rules) {
      const flag = rule.evaluate({
        customerId,
        events: timeline,
        today,
        email: contact.email,
        phone: contact.phone,
        childCount: context.children.get(customerId)?.length ?? 0,
      });
      if (!flag) continue;

      if (contact.usingParentContact) {
        flags.push({
          ...flag,
          flagType: `${flag.flagType}${CHILD_SUFFIX}`,
          flagData: { ...flag.flagData, isUsingParentContact: true },
        });
      } else {
        flags.push(flag);
      }
    }
    return flags;
  }

  evaluateAllCustomers(input: EvaluateAllInput): EvaluationResult {
    const { today } = input;
    const context = input.context ?? EMPTY_CONTEXT;
    const flagAddedDate = today.toISOString();

    logger.info(`Evaluating ${this.rules.length} rules as of ${flagAddedDate}`);
    for (const rule of this.rules) logger.debug(`  ${rule.flagType}: ${rule.description}`);

    const grouped = groupByCustomer(input.events);
    const newFlags: Flag[] = [];
    let customersFlagged = 0;

    for (const [customerId, events] of grouped) {
      const flags = this.evaluateCustomer(customerId, events, today, context);
      if (flags.length === 0) continue;
      customersFlagged++;

      for (const flag of flags) {
        newFlags.push({ ...flag, flagAddedDate });
        if (input.experimentSink) recordExperimentEntry(input.experimentSink, flag);
      }
    }

    const merged = mergeFlags(input.previousFlags ?? [], newFlags);
    const kept = removeExpiredFlags(merged, today, this.isPersistent, this.expirationDays);
    const flags = sortFlags(kept);

    const surviving = new Set<Flag>(kept);
    const flagSetEvents = buildFlagSetEvents(newFlags.filter(flag => surviving.has(flag)));

    logger.info(
      `Evaluated ${grouped.size} customers: ${customersFlagged} flagged, ${newFlags.length} new flags,`,
      `${merged.length - kept.length} expired, ${flags.length} in table`,
    );

    return {
      flags,
      newFlags: sortFlags(newFlags),
      flagSetEvents,
      customersEvaluated: grouped.size,
      customersFlagged,
      expired: merged.length - kept.length,
    };
  }
}

function groupByCustomer(events: CustomerEvent[]): Map<string, CustomerEvent[]> {
  const grouped = new Map<string, CustomerEvent[]>();
  for (const event of events) {
    let list = grouped.get(event.customerId);
    if (!list) {
      list = [];
      grouped.set(event.customerId, list);
    }
    list.push(event);
  }
  return grouped;
}

/** A/B groups are discovered at the first qualifying trigger, not assigned up front. */
function recordExperimentEntry(sink: ExperimentSink, flag: FlagCandidate): void {
  const { experimentId, abGroup } = flag.flagData;
  if (typeof experimentId !== 'string' || typeof abGroup !== 'string') return;
  sink.record({
    customerId: flag.customerId,
    experimentId,
    group: abGroup,
    entryFlag: flag.flagType,
    entryDate: flag.triggeredDate,
  });
}
