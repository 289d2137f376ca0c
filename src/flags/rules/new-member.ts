import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { addDays, daysBetween } from '../../utils/index.js';
import { flaggedWithin, latest, MEMBERSHIP_EVENTS, ofType, payloadString, syncedWithin } from '../timeline.js';
import { BaseRule } from './base.js';

export class NewMemberRule extends BaseRule {
  readonly flagType = 'new_member';
  readonly description = 'Customer is a new member (joined after 6+ months of no membership)';
  readonly priority = 'high' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, today } = input;

    const start = latest(ofType(events, 'membership_started', 'membership_purchase'));
    if (!start) return null;
    if (start.eventDate < addDays(today, -3)) return null;

    const prior = ofType(events, ...MEMBERSHIP_EVENTS).filter(e => e.eventDate < start.eventDate);
    const gapStart = addDays(start.eventDate, -180);
    if (prior.some(e => e.eventDate >= gapStart)) return null;

    if (flaggedWithin(events, this.flagType, today, 14)) return null;
    if (syncedWithin(events, this.flagType, today, 14)) return null;

    const lastPrior = latest(prior);

    return this.flag(input, {
      membershipStartDate: start.eventDate.toISOString(),
      daysSinceStart: daysBetween(start.eventDate, today),
      membershipName: payloadString(start, 'membershipName'),
      membershipId: payloadString(start, 'membershipId'),
      isFirstTimeMember: lastPrior === undefined,
      daysSinceLastMembership: lastPrior ? daysBetween(lastPrior.eventDate, start.eventDate) : null,
    });
  }
}
