export type EventPayload = Record<string, unknown>;

/** One customer touchpoint as stored in the shared event feed. */
export interface CustomerEvent {
  customerId: string;
  eventType: string;
  eventDate: string;
  source: string;
  payload: EventPayload;
}

/** An event whose date has been coerced for evaluation. */
export interface TimelineEvent {
  customerId: string;
  eventType: string;
  eventDate: Date;
  source: string;
  payload: EventPayload;
}

export const FLAG_SET_EVENT = 'flag_set';
export const FLAG_SYNCED_EVENT = 'flag_synced';
