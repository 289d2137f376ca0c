import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { daysBetween } from '../../utils/index.js';
import { flaggedWithin, payloadString, prepaidPassStarts } from '../timeline.js';
import { BaseRule } from './base.js';

export class TwoWeekPassRule extends BaseRule {
  readonly flagType = '2_week_pass_purchase';
  readonly description = 'Customer purchased a 2-week climbing or fitness pass';
  readonly priority = 'medium' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, today } = input;

    const passes = prepaidPassStarts(events);
    if (passes.length === 0) return null;
    if (flaggedWithin(events, this.flagType, today, 14)) return null;

    const pass = passes[passes.length - 1];
    const billingAmount = pass.payload.billingAmount;

    return this.flag(input, {
      membershipStartDate: pass.eventDate.toISOString(),
      daysSinceStart: daysBetween(pass.eventDate, today),
      membershipName: payloadString(pass, 'membershipName'),
      membershipId: payloadString(pass, 'membershipId'),
      endDate: payloadString(pass, 'endDate'),
      billingAmount: typeof billingAmount === 'number' ? billingAmount : 0,
      totalTwoWeekPasses: passes.length,
    });
  }
}
