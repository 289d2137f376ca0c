import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { isActiveMember, isPrepaidPass, latest, MEMBERSHIP_EVENTS, ofType, payloadString } from '../timeline.js';
import { BaseRule } from './base.js';

/** Status flag; `active-membership` is in the persistent set. Prepaid passes do not count. */
export class ActiveMembershipRule extends BaseRule {
  readonly flagType = 'active-membership';
  readonly description = 'Customer has an active membership';
  readonly priority = 'low' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events } = input;
    if (!isActiveMember(events)) return null;

    const last = latest(ofType(events, ...MEMBERSHIP_EVENTS));
    if (!last) return null;

    const membershipName = payloadString(last, 'membershipName');
    if (isPrepaidPass(membershipName)) return null;

    return this.flag(input, {
      membershipName,
      membershipSince: last.eventDate.toISOString(),
    });
  }
}
