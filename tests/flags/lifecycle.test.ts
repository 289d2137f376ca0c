import { describe, it, expect } from 'vitest';
import {
  appendFlagSetEvents, buildFlagSetEvents, mergeFlags, removeExpiredFlags, sortFlags,
} from '../../src/flags/lifecycle.js';
import { createPersistentClassifier } from '../../src/flags/persistence.js';
import { addDays } from '../../src/utils/index.js';
import { makeEvent, makeFlag, TODAY } from '../helpers.js';

const isPersistent = createPersistentClassifier();

function triggeredDaysAgo(flagType: string, days: number) {
  return makeFlag({ flagType, triggeredDate: addDays(TODAY, -days).toISOString() });
}

describe('removeExpiredFlags', () => {
  it('should drop a non-persistent flag triggered 15 days ago', () => {
    expect(removeExpiredFlags([triggeredDaysAgo('ready_for_membership', 15)], TODAY, isPersistent)).toEqual([]);
  });

  it('should keep a non-persistent flag triggered 13 days ago', () => {
    const flag = triggeredDaysAgo('ready_for_membership', 13);
    expect(removeExpiredFlags([flag], TODAY, isPersistent)).toEqual([flag]);
  });

  it('should keep a flag triggered exactly 14 days ago', () => {
    const flag = triggeredDaysAgo('ready_for_membership', 14);
    expect(removeExpiredFlags([flag], TODAY, isPersistent)).toEqual([flag]);
  });

  it('should keep persistent flags of any age, including their child variant', () => {
    const flags = [triggeredDaysAgo('active-membership', 100), triggeredDaysAgo('active-membership_child', 100)];
    expect(removeExpiredFlags(flags, TODAY, isPersistent)).toEqual(flags);
  });

  it('should honour a custom window', () => {
    const flag = triggeredDaysAgo('ready_for_membership', 5);
    expect(removeExpiredFlags([flag], TODAY, isPersistent, 3)).toEqual([]);
  });
});

describe('createPersistentClassifier', () => {
  it('should use the configured types', () => {
    const classify = createPersistentClassifier(['vip']);
    expect(classify('vip')).toBe(true);
    expect(classify('vip_child')).toBe(true);
    expect(classify('active-membership')).toBe(false);
  });
});

describe('mergeFlags', () => {
  const older = makeFlag({ flagType: 'new_member', flagAddedDate: '2026-03-01T00:00:00.000Z', flagData: { run: 'old' } });
  const newer = makeFlag({ flagType: 'new_member', flagAddedDate: '2026-03-10T00:00:00.000Z', flagData: { run: 'new' } });

  it('should keep only the latest flagAddedDate per customer and type', () => {
    expect(mergeFlags([older], [newer])).toEqual([newer]);
    expect(mergeFlags([newer], [older])).toEqual([newer]);
  });

  it('should prefer the new flag on a tie', () => {
    const rerun = { ...newer, flagData: { run: 'rerun' } };
    expect(mergeFlags([newer], [rerun])).toEqual([rerun]);
  });

  it('should keep different types and customers apart', () => {
    const other = makeFlag({ flagType: 'ready_for_membership' });
    const otherCustomer = makeFlag({ flagType: 'new_member', customerId: 'c2' });
    expect(mergeFlags([older, other], [otherCustomer])).toHaveLength(3);
  });
});

describe('sortFlags', () => {
  it('should order by priority then trigger date', () => {
    const low = makeFlag({ flagType: 'active-membership', priority: 'low', triggeredDate: '2026-01-01T00:00:00.000Z' });
    const lateHigh = makeFlag({ flagType: 'b', triggeredDate: '2026-03-10T00:00:00.000Z' });
    const earlyHigh = makeFlag({ flagType: 'a', triggeredDate: '2026-03-01T00:00:00.000Z' });

    expect(sortFlags([low, lateHigh, earlyHigh]).map(f => f.flagType)).toEqual(['a', 'b', 'active-membership']);
  });
});

describe('buildFlagSetEvents', () => {
  it('should emit one flag_set event per flag dated by flagAddedDate', () => {
    const flag = makeFlag({
      flagType: 'new_member',
      triggeredDate: '2026-03-15T12:00:00.000Z',
      flagAddedDate: '2026-03-15T12:00:00.000Z',
    });

    expect(buildFlagSetEvents([flag])).toEqual([{
      customerId: 'c1',
      eventType: 'flag_set',
      eventDate: '2026-03-15T12:00:00.000Z',
      source: 'flags',
      payload: { flagType: 'new_member', priority: 'high', triggeredDate: '2026-03-15T12:00:00.000Z' },
    }]);
  });
});

describe('appendFlagSetEvents', () => {
  const checkin = makeEvent('c2', 'checkin', '2026-03-14T00:00:00.000Z');
  const setEvent = makeEvent('c1', 'flag_set', '2026-03-15T12:00:00.000Z', { flagType: 'new_member' });

  it('should not duplicate an event already in the feed', () => {
    const rerun = { ...setEvent, payload: { flagType: 'new_member', priority: 'high' } };
    const feed = appendFlagSetEvents([checkin, setEvent], [rerun]);

    expect(feed).toEqual([rerun, checkin]);
  });

  it('should keep events for different flag types on the same date', () => {
    const other = makeEvent('c1', 'flag_set', '2026-03-15T12:00:00.000Z', { flagType: 'ready_for_membership' });
    expect(appendFlagSetEvents([setEvent], [other])).toHaveLength(2);
  });

  it('should sort by customer then date', () => {
    const early = makeEvent('c1', 'checkin', '2026-03-01T00:00:00.000Z');
    const feed = appendFlagSetEvents([checkin, setEvent], [early]);

    expect(feed.map(e => `${e.customerId}:${e.eventType}`)).toEqual(['c1:checkin', 'c1:flag_set', 'c2:checkin']);
  });
});
