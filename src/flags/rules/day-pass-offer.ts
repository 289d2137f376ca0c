import type { FlagCandidate, RuleInput } from '../../types/index.js';
import { addDays, daysBetween } from '../../utils/index.js';
import { getCustomerAbGroup, type AbGroup } from '../ab-group.js';
import { dayPassCheckins, flaggedWithin, isActiveMember, syncedWithin } from '../timeline.js';
import { BaseRule } from './base.js';

export interface DayPassOfferOptions {
  experimentId: string;
  abGroupOverrides?: Readonly<Record<string, AbGroup>>;
}

/**
 * Day-pass conversion experiment. Both arms target a customer whose latest
 * day-pass check-in is recent and who had none in the 60 days before it;
 * the A/B group decides which offer they enter.
 */
abstract class DayPassOfferRule extends BaseRule {
  readonly priority = 'high' as const;
  protected abstract readonly group: AbGroup;

  constructor(private readonly options: DayPassOfferOptions) {
    super();
  }

  evaluate(input: RuleInput): FlagCandidate | null {
    const { customerId, events, today, email, phone } = input;

    const group = getCustomerAbGroup({ customerId, email, phone }, this.options.abGroupOverrides);
    if (group !== this.group) return null;

    const checkins = dayPassCheckins(events);
    if (checkins.length === 0) return null;

    const mostRecent = checkins[checkins.length - 1];
    if (mostRecent.eventDate < addDays(today, -3)) return null;

    const breakStart = addDays(mostRecent.eventDate, -60);
    const priorInBreak = checkins.some(e => e.eventDate < mostRecent.eventDate && e.eventDate >= breakStart);
    if (priorInBreak) return null;

    if (isActiveMember(events)) return null;
    if (flaggedWithin(events, this.flagType, today, 180)) return null;
    if (syncedWithin(events, this.flagType, today, 30)) return null;

    const previous = checkins.length > 1 ? checkins[checkins.length - 2] : undefined;
    const daysSincePrevious = previous ? daysBetween(previous.eventDate, mostRecent.eventDate) : null;

    return this.flag(input, {
      abGroup: this.group,
      experimentId: this.options.experimentId,
      mostRecentCheckinDate: mostRecent.eventDate.toISOString(),
      daysSinceCheckin: daysBetween(mostRecent.eventDate, today),
      totalDayPassCheckins: checkins.length,
      daysSincePreviousCheckin: daysSincePrevious,
      returningAfterBreak: daysSincePrevious === null || daysSincePrevious >= 60,
    });
  }
}

export class FirstTimeDayPassOfferRule extends DayPassOfferRule {
  readonly flagType = 'first_time_day_pass_2wk_offer';
  readonly description = '[Group A] Customer eligible for 2-week membership offer (first-time or returning after 2+ month break)';
  protected readonly group = 'A' as const;
}

export class SecondVisitOfferRule extends DayPassOfferRule {
  readonly flagType = 'second_visit_offer_eligible';
  readonly description = '[Group B] Customer eligible for half-price second visit offer (returning after 2+ month break)';
  protected readonly group = 'B' as const;
}
