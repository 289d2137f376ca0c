import type { TimelineEvent } from './event.js';

export type FlagPriority = 'high' | 'medium' | 'low';

export type FlagData = Record<string, unknown>;

export interface Flag {
  customerId: string;
  flagType: string;
  triggeredDate: string;
  flagData: FlagData;
  priority: FlagPriority;
  flagAddedDate: string;
}

/** What a rule emits; the engine stamps `flagAddedDate`. */
export type FlagCandidate = Omit<Flag, 'flagAddedDate'>;

export interface RuleInput {
  customerId: string;
  /** Ascending by `eventDate`. */
  events: TimelineEvent[];
  today: Date;
  email?: string;
  phone?: string;
  /** Customers linked to this one as its children in the family graph. */
  childCount?: number;
}

export interface FlagRule {
  readonly flagType: string;
  readonly description: string;
  readonly priority: FlagPriority;
  evaluate(input: RuleInput): FlagCandidate | null;
}

export interface ExperimentEntry {
  customerId: string;
  experimentId: string;
  group: string;
  entryFlag: string;
  entryDate: string;
}

export interface ExperimentSink {
  record(entry: ExperimentEntry): void;
}

export const PRIORITY_ORDER: Record<FlagPriority, number> = { high: 0, medium: 1, low: 2 };
