import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { addDays, daysBetween } from '../../utils/index.js';
import { latest, ofType } from '../timeline.js';
import { BaseRule } from './base.js';

/** Day pass bought in the last two weeks, never a membership. */
export class ReadyForMembershipRule extends BaseRule {
  readonly flagType = 'ready_for_membership';
  readonly description = 'Customer purchased day pass(es) in last 2 weeks but has no membership';
  readonly priority = 'high' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, today } = input;
    const since = addDays(today, -14);

    const recentPasses = ofType(events, 'day_pass_purchase')
      .filter(e => e.eventDate >= since && e.eventDate <= today);
    if (recentPasses.length === 0) return null;

    if (ofType(events, 'membership_purchase', 'membership_renewal').length > 0) return null;

    const mostRecent = latest(recentPasses);
    if (!mostRecent) return null;

    return this.flag(input, {
      dayPassCountLast14Days: recentPasses.length,
      mostRecentDayPassDate: mostRecent.eventDate.toISOString(),
      daysSinceLastPass: daysBetween(mostRecent.eventDate, today),
    });
  }
}
