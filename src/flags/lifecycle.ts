import type { CustomerEvent, Flag } from '../types/index.js';
import { FLAG_SET_EVENT, PRIORITY_ORDER } from '../types/index.js';
import { addDays, toDate } from '../utils/index.js';
import type { PersistentFlagPredicate } from './persistence.js';

export const DEFAULT_EXPIRATION_DAYS = 14;

function flagKey(flag: Flag): string {
  return `${flag.customerId}\u0000${flag.flagType}`;
}

/**
 * Union of previous and new flags, keeping per (customer, flag type) the row
 * with the latest `flagAddedDate`. On a tie the new row wins.
 */
export function mergeFlags(previous: Flag[], incoming: Flag[]): Flag[] {
  const merged = new Map<string, Flag>();
  for (const flag of [...previous, ...incoming]) {
    const key = flagKey(flag);
    const existing = merged.get(key);
    if (!existing || toDate(flag.flagAddedDate) >= toDate(existing.flagAddedDate)) {
      merged.set(key, flag);
    }
  }
  return [...merged.values()];
}

/** Drop non-persistent flags triggered more than `days` days before `today`. */
export function removeExpiredFlags(
  flags: Flag[],
  today: Date,
  isPersistent: PersistentFlagPredicate,
  days: number = DEFAULT_EXPIRATION_DAYS,
): Flag[] {
  const cutoff = addDays(today, -days);
  return flags.filter(flag => isPersistent(flag.flagType) || toDate(flag.triggeredDate) >= cutoff);
}

/** Priority first (high, medium, low), then trigger date. */
export function sortFlags(flags: Flag[]): Flag[] {
  return [...flags].sort((a, b) =>
    PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]
    || toDate(a.triggeredDate).getTime() - toDate(b.triggeredDate).getTime());
}

export function buildFlagSetEvents(flags: Flag[]): CustomerEvent[] {
  return flags.map(flag => ({
    customerId: flag.customerId,
    eventType: FLAG_SET_EVENT,
    eventDate: flag.flagAddedDate,
    source: 'flags',
    payload: {
      flagType: flag.flagType,
      priority: flag.priority,
      triggeredDate: flag.triggeredDate,
    },
  }));
}

function eventKey(event: CustomerEvent): string {
  const flagType = typeof event.payload.flagType === 'string' ? event.payload.flagType : '';
  return [event.customerId, event.eventType, toDate(event.eventDate).getTime(), flagType].join('\u0000');
}

/**
 * Add `flag_set` events to the feed. A re-run on the same day replaces the
 * earlier event for the same customer and flag type instead of duplicating it.
 */
export function appendFlagSetEvents(feed: CustomerEvent[], flagEvents: CustomerEvent[]): CustomerEvent[] {
  const byKey = new Map<string, CustomerEvent>();
  for (const event of [...feed, ...flagEvents]) {
    const key = eventKey(event);
    byKey.delete(key);
    byKey.set(key, event);
  }
  return [...byKey.values()].sort((a, b) =>
    a.customerId.localeCompare(b.customerId)
    || toDate(a.eventDate).getTime() - toDate(b.eventDate).getTime());
}
