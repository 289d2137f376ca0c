import type { CustomerEvent, TimelineEvent } from '../types/index.js';
import { FLAG_SET_EVENT, FLAG_SYNCED_EVENT } from '../types/index.js';
import { addDays, toDate } from '../utils/index.js';
import { CHILD_SUFFIX } from './persistence.js';

export const MEMBERSHIP_EVENTS = [
  'membership_started', 'membership_purchase', 'membership_renewal', 'membership_cancelled',
] as const;

const PREPAID_PASS_KEYWORDS = ['2-week', '2 week', 'two week'];

/** Coerce every event date and sort ascending. Events with unparseable dates are dropped. */
export function toTimeline(events: Array<CustomerEvent | TimelineEvent>): TimelineEvent[] {
  const timeline: TimelineEvent[] = [];
  for (const event of events) {
    const eventDate = toDate(event.eventDate);
    if (Number.isNaN(eventDate.getTime())) continue;
    timeline.push({ ...event, eventDate });
  }
  return timeline.sort((a, b) => a.eventDate.getTime() - b.eventDate.getTime());
}

export function ofType(events: TimelineEvent[], ...types: readonly string[]): TimelineEvent[] {
  return events.filter(e => types.includes(e.eventType));
}

export function latest(events: TimelineEvent[]): TimelineEvent | undefined {
  let result: TimelineEvent | undefined;
  for (const event of events) {
    if (!result || event.eventDate >= result.eventDate) result = event;
  }
  return result;
}

export function payloadString(event: TimelineEvent, key: string): string {
  const value = event.payload[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Any event of `eventType` for this flag type, or its `_child` variant,
 * within the last `days` days (inclusive of today).
 */
function markedWithin(events: TimelineEvent[], eventType: string, flagType: string, today: Date, days: number): boolean {
  const since = addDays(today, -days);
  const types = [flagType, `${flagType}${CHILD_SUFFIX}`];
  return events.some(e =>
    e.eventType === eventType
    && types.includes(payloadString(e, 'flagType'))
    && e.eventDate >= since
    && e.eventDate <= today);
}

export function flaggedWithin(events: TimelineEvent[], flagType: string, today: Date, days: number): boolean {
  return markedWithin(events, FLAG_SET_EVENT, flagType, today, days);
}

export function syncedWithin(events: TimelineEvent[], flagType: string, today: Date, days: number): boolean {
  return markedWithin(events, FLAG_SYNCED_EVENT, flagType, today, days);
}

export function dayPassCheckins(events: TimelineEvent[]): TimelineEvent[] {
  return events.filter(e =>
    e.eventType === 'checkin'
    && payloadString(e, 'entryMethodDescription').toLowerCase().includes('day pass'));
}

export function isPrepaidPass(membershipName: string): boolean {
  if (!membershipName) return false;
  const lower = membershipName.toLowerCase();
  return PREPAID_PASS_KEYWORDS.some(keyword => lower.includes(keyword));
}

/** Membership starts and purchases whose name marks a prepaid pass, ascending. */
export function prepaidPassStarts(events: TimelineEvent[]): TimelineEvent[] {
  return ofType(events, 'membership_started', 'membership_purchase')
    .filter(e => isPrepaidPass(payloadString(e, 'membershipName')));
}

/** Active when the most recent membership event is anything but a cancellation. */
export function isActiveMember(events: TimelineEvent[]): boolean {
  const last = latest(ofType(events, ...MEMBERSHIP_EVENTS));
  return last !== undefined && last.eventType !== 'membership_cancelled';
}
