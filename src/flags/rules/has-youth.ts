import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { isActiveMember, latest, MEMBERSHIP_EVENTS, ofType, payloadString } from '../timeline.js';
import { BaseRule } from './base.js';

const YOUTH_MEMBERSHIP_KEYWORDS = ['youth', 'family', 'junior', 'kid', 'child'];
const BIRTHDAY_PARTY_EVENTS = ['birthday_party_booked', 'birthday_party_rsvp'];

/**
 * Status flag for customers with youth on the account: an active youth or
 * family membership, children in the family graph, or a birthday party
 * booking or RSVP. Any one qualifies; every reason found is listed.
 */
export class HasYouthRule extends BaseRule {
  readonly flagType = 'has-youth';
  readonly description = 'Customer has youth in family/membership';
  readonly priority = 'low' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, childCount = 0 } = input;
    const reasons: string[] = [];

    if (isActiveMember(events)) {
      const names = new Set(
        ofType(events, ...MEMBERSHIP_EVENTS)
          .filter(e => e.eventType !== 'membership_cancelled')
          .map(e => payloadString(e, 'membershipName'))
          .filter(isYouthMembership),
      );
      if (names.size > 0) reasons.push(`youth/family membership: ${[...names].join(', ')}`);
    }

    if (childCount > 0) reasons.push('parent in family relationships');

    const party = latest(ofType(events, ...BIRTHDAY_PARTY_EVENTS));
    if (party) reasons.push(`birthday party: ${party.eventType}`);

    if (reasons.length === 0) return null;
    return this.flag(input, { reasons });
  }
}

function isYouthMembership(name: string): boolean {
  const lower = name.toLowerCase();
  return YOUTH_MEMBERSHIP_KEYWORDS.some(keyword => lower.includes(keyword));
}
