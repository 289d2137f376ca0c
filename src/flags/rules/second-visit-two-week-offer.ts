import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { FLAG_SET_EVENT } from '../../types/index.js';
import { daysBetween } from '../../utils/index.js';
import { CHILD_SUFFIX } from '../persistence.js';
import { flaggedWithin, isActiveMember, latest, ofType, payloadString, syncedWithin } from '../timeline.js';
import { BaseRule } from './base.js';

const SECOND_VISIT_OFFER = 'second_visit_offer_eligible';

/**
 * Second step of the group B arm: the customer was sent the second-visit
 * offer and has checked in since, so they now get the two-week offer.
 */
export class SecondVisitTwoWeekOfferRule extends BaseRule {
  readonly flagType = 'second_visit_2wk_offer';
  readonly description = '[Group B - Step 2] Customer returned after 2nd pass offer, eligible for 2-week membership';
  readonly priority = 'high' as const;

  constructor(private readonly experimentId: string) {
    super();
  }

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, today } = input;

    const offerTypes = [SECOND_VISIT_OFFER, `${SECOND_VISIT_OFFER}${CHILD_SUFFIX}`];
    const offer = latest(ofType(events, FLAG_SET_EVENT).filter(e => offerTypes.includes(payloadString(e, 'flagType'))));
    if (!offer) return null;

    const returns = ofType(events, 'checkin').filter(e => e.eventDate > offer.eventDate);
    if (returns.length === 0) return null;

    if (isActiveMember(events)) return null;
    if (flaggedWithin(events, this.flagType, today, 180)) return null;
    if (syncedWithin(events, this.flagType, today, 30)) return null;

    const firstReturn = returns[0];
    return this.flag(input, {
      abGroup: 'B',
      experimentId: this.experimentId,
      secondPassFlagDate: offer.eventDate.toISOString(),
      returnVisitDate: firstReturn.eventDate.toISOString(),
      daysToReturn: daysBetween(offer.eventDate, firstReturn.eventDate),
      totalCheckinsAfterFlag: returns.length,
    });
  }
}
