import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { addDays, daysBetween } from '../../utils/index.js';
import { flaggedWithin, latest, MEMBERSHIP_EVENTS, ofType, payloadString, syncedWithin } from '../timeline.js';
import { BaseRule } from './base.js';

/**
 * Recently cancelled member with nothing active left. A new membership
 * after the cancellation is a plan switch, not attrition.
 */
export class MembershipCancelledWinbackRule extends BaseRule {
  readonly flagType = 'membership_cancelled_winback';
  readonly description = 'Recently cancelled member eligible for win-back outreach';
  readonly priority = 'high' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, today } = input;

    const cancellations = ofType(events, 'membership_cancelled');
    const cancellation = latest(cancellations);
    if (!cancellation) return null;
    if (cancellation.eventDate < addDays(today, -7)) return null;

    const after = ofType(events, 'membership_purchase', 'membership_renewal', 'membership_started')
      .some(e => e.eventDate > cancellation.eventDate);
    if (after) return null;

    const last = latest(ofType(events, ...MEMBERSHIP_EVENTS));
    if (last && last.eventType !== 'membership_cancelled') return null;

    if (flaggedWithin(events, this.flagType, today, 180)) return null;
    if (syncedWithin(events, this.flagType, today, 30)) return null;

    return this.flag(input, {
      cancellationDate: cancellation.eventDate.toISOString(),
      daysSinceCancellation: daysBetween(cancellation.eventDate, today),
      cancelledMembershipName: payloadString(cancellation, 'membershipName'),
      cancelledMembershipId: payloadString(cancellation, 'membershipId'),
      totalCancellations: cancellations.length,
    });
  }
}
