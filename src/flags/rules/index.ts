import type { FlagRule } from '../../types/index.js';
import type { AbGroup } from '../ab-group.js';
import { ActiveMembershipRule } from './active-membership.js';
import { ActivePrepaidPassRule } from './active-prepaid-pass.js';
import { FirstTimeDayPassOfferRule, SecondVisitOfferRule } from './day-pass-offer.js';
import { HasYouthRule } from './has-youth.js';
import { MembershipCancelledWinbackRule } from './membership-winback.js';
import { NewMemberRule } from './new-member.js';
import { ReadyForMembershipRule } from './ready-for-membership.js';
import { SecondVisitTwoWeekOfferRule } from './second-visit-two-week-offer.js';
import { TwoWeekPassRule } from './two-week-pass.js';

export { BaseRule } from './base.js';
export { ActiveMembershipRule } from './active-membership.js';
export { ActivePrepaidPassRule } from './active-prepaid-pass.js';
export { FirstTimeDayPassOfferRule, SecondVisitOfferRule } from './day-pass-offer.js';
export type { DayPassOfferOptions } from './day-pass-offer.js';
export { HasYouthRule } from './has-youth.js';
export { MembershipCancelledWinbackRule } from './membership-winback.js';
export { NewMemberRule } from './new-member.js';
export { ReadyForMembershipRule } from './ready-for-membership.js';
export { SecondVisitTwoWeekOfferRule } from './second-visit-two-week-offer.js';
export { TwoWeekPassRule } from './two-week-pass.js';

export interface RuleRegistryOptions {
  experimentId?: string;
  abGroupOverrides?: Readonly<Record<string, AbGroup>>;
  disabledRules?: readonly string[];
}

export const DEFAULT_EXPERIMENT_ID = 'day_pass_conversion';

/** The active rules, in evaluation order. */
export function getDefaultRules(options: RuleRegistryOptions = {}): FlagRule[] {
  const offer = {
    experimentId: options.experimentId ?? DEFAULT_EXPERIMENT_ID,
    abGroupOverrides: options.abGroupOverrides,
  };
  const rules: FlagRule[] = [
    new ReadyForMembershipRule(),
    new FirstTimeDayPassOfferRule(offer),
    new SecondVisitOfferRule(offer),
    new SecondVisitTwoWeekOfferRule(offer.experimentId),
    new TwoWeekPassRule(),
    new MembershipCancelledWinbackRule(),
    new NewMemberRule(),
    new ActiveMembershipRule(),
    new ActivePrepaidPassRule(),
    new HasYouthRule(),
  ];
  const disabled = new Set(options.disabledRules ?? []);
  return rules.filter(rule => !disabled.has(rule.flagType));
}
