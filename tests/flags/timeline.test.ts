import { describe, it, expect } from 'vitest';
import {
  dayPassCheckins, flaggedWithin, isActiveMember, isPrepaidPass, syncedWithin, toTimeline,
} from '../../src/flags/timeline.js';
import { makeEvent, TODAY } from '../helpers.js';

describe('toTimeline', () => {
  it('should read timestamps without an offset as UTC', () => {
    const [event] = toTimeline([makeEvent('c1', 'checkin', '2026-03-01T10:00:00')]);
    expect(event.eventDate.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it('should sort ascending and drop unparseable dates', () => {
    const timeline = toTimeline([
      makeEvent('c1', 'b', '2026-03-02'),
      makeEvent('c1', 'x', 'yesterday'),
      makeEvent('c1', 'a', '2026-03-01'),
    ]);
    expect(timeline.map(e => e.eventType)).toEqual(['a', 'b']);
  });
});

describe('timeline helpers', () => {
  it('should find day pass check-ins case-insensitively', () => {
    const timeline = toTimeline([
      makeEvent('c1', 'checkin', '2026-03-01', { entryMethodDescription: 'DAY PASS' }),
      makeEvent('c1', 'checkin', '2026-03-02', { entryMethodDescription: 'Member' }),
      makeEvent('c1', 'checkin', '2026-03-03'),
    ]);
    expect(dayPassCheckins(timeline)).toHaveLength(1);
  });

  it('should recognise prepaid pass names', () => {
    expect(isPrepaidPass('2-Week Pass')).toBe(true);
    expect(isPrepaidPass('Two Week Trial')).toBe(true);
    expect(isPrepaidPass('Monthly')).toBe(false);
    expect(isPrepaidPass('')).toBe(false);
  });

  it('should treat the latest membership event as the membership state', () => {
    expect(isActiveMember(toTimeline([
      makeEvent('c1', 'membership_cancelled', '2026-01-01'),
      makeEvent('c1', 'membership_renewal', '2026-02-01'),
    ]))).toBe(true);
    expect(isActiveMember([])).toBe(false);
  });

  it('should match flag markers by type and window', () => {
    const timeline = toTimeline([
      makeEvent('c1', 'flag_set', '2026-03-01', { flagType: 'new_member' }),
      makeEvent('c1', 'flag_synced', '2026-02-01', { flagType: 'new_member' }),
    ]);

    expect(flaggedWithin(timeline, 'new_member', TODAY, 15)).toBe(true);
    expect(flaggedWithin(timeline, 'new_member', TODAY, 14)).toBe(false);
    expect(flaggedWithin(timeline, 'ready_for_membership', TODAY, 180)).toBe(false);
    expect(syncedWithin(timeline, 'new_member', TODAY, 30)).toBe(false);
    expect(syncedWithin(timeline, 'new_member', TODAY, 60)).toBe(true);
  });

  it('should count markers of the child variant', () => {
    const timeline = toTimeline([makeEvent('kid', 'flag_set', '2026-03-10', { flagType: 'new_member_child' })]);
    expect(flaggedWithin(timeline, 'new_member', TODAY, 14)).toBe(true);
  });
});
