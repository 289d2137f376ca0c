import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { addDays, toDate } from '../../utils/index.js';
import { ofType, payloadString, prepaidPassStarts } from '../timeline.js';
import { BaseRule } from './base.js';

const DEFAULT_PASS_DAYS = 14;

/**
 * Status flag for a prepaid pass that has not run out. A pass without an
 * `endDate` in its payload runs for two weeks from its start.
 */
export class ActivePrepaidPassRule extends BaseRule {
  readonly flagType = 'active-prepaid-pass';
  readonly description = 'Customer has an active prepaid pass (2-week pass, etc.)';
  readonly priority = 'low' as const;

  evaluate(input: RuleInput): FlagCandidate | null {
    const { events, today } = input;

    const passes = prepaidPassStarts(events);
    if (passes.length === 0) return null;

    const pass = passes[passes.length - 1];
    if (ofType(events, 'membership_cancelled').some(e => e.eventDate > pass.eventDate)) return null;

    const endDate = passEnd(payloadString(pass, 'endDate'), pass.eventDate);
    if (endDate < today) return null;

    return this.flag(input, {
      passName: payloadString(pass, 'membershipName'),
      passStartDate: pass.eventDate.toISOString(),
      passEndDate: endDate.toISOString(),
      passCount: passes.length,
    });
  }
}

function passEnd(endDate: string, start: Date): Date {
  const parsed = endDate ? toDate(endDate) : null;
  if (parsed && !Number.isNaN(parsed.getTime())) return parsed;
  return addDays(start, DEFAULT_PASS_DAYS);
}
