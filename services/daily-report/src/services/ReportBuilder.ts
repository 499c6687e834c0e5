import { logger } from '@funnelreport/shared';
import { ALL_ACTIVE } from '../types';
import type {
  AggregatorConfig,
  BucketKey,
  CohortRecord,
  DailyReport,
  PartialAggregate,
  RateString,
  ReportOptions,
  ReportRates,
  UserState,
} from '../types';
import { roundHalfEven } from '../utils/rounding';
import { SessionWindowTracker } from './SessionWindowTracker';
import { displayScreens } from './UserStateAccumulator';

/** Rendered in place of a percentage whose denominator is zero. */
export const NO_RATE = '—';

const sessions = new SessionWindowTracker();

export function formatRate(numerator: number, denominator: number): RateString {
  if (denominator === 0) {
    return NO_RATE;
  }
  return `${roundHalfEven((100 * numerator) / denominator)}%`;
}

function projectUser(state: UserState, screenCap: number, timeSpentMins: number): CohortRecord {
  // Session windows are reduced to time_spent_mins by the caller
  const { screens, session_ids, session_windows, ...scalars } = state;

  return Object.freeze({
    ...scalars,
    screens: Object.freeze(displayScreens(state, screenCap)),
    screens_visited_count: screens.size,
    time_spent_mins: timeSpentMins,
    session_count: session_ids.size,
  });
}

/**
 * Derives the final report from an aggregation pass: unique-user counts per
 * action, rates, average time spent and the new-signup cohort sorted by user key.
 */
export function buildReport(
  partial: PartialAggregate,
  config: AggregatorConfig,
  options: ReportOptions = {}
): DailyReport {
  const bucket = (key: BucketKey): ReadonlySet<string> => partial.buckets.get(key) ?? new Set();
  const uniques = (key: BucketKey): number => bucket(key).size;
  const unionSize = (a: BucketKey, b: BucketKey): number => new Set([...bucket(a), ...bucket(b)]).size;

  const cohortCap = Math.min(config.userScreenCap, config.cohortScreenCap);
  const userIds = [...partial.users.keys()].sort();

  const allUsers: CohortRecord[] = [];
  const newSignups: CohortRecord[] = [];
  let totalTimeSpent = 0;

  for (const userId of userIds) {
    const state = partial.users.get(userId);
    if (!state) continue;

    const timeSpentMins = sessions.timeSpentMins(state.session_windows);
    totalTimeSpent += timeSpentMins;
    allUsers.push(projectUser(state, config.userScreenCap, timeSpentMins));
    if (state.signup_completed) {
      newSignups.push(projectUser(state, cohortCap, timeSpentMins));
    }
  }

  const totalActive = uniques(ALL_ACTIVE);
  const signupCompleted = uniques('signup_completed');
  const cardSuccess = uniques('card_link_success');
  const bankSuccess = uniques('bank_link_success');

  const rates: ReportRates = Object.freeze({
    signup_completion_rate: formatRate(signupCompleted, uniques('signup_started')),
    signup_failure_rate: formatRate(uniques('signup_failed'), uniques('signup_started')),
    onboarding_rate: formatRate(uniques('onboarding_completed'), signupCompleted),
    card_link_success_rate: formatRate(cardSuccess, unionSize('card_link_success', 'card_link_failed')),
    bank_link_success_rate: formatRate(bankSuccess, unionSize('bank_link_success', 'bank_link_failed')),
    new_signup_card_rate: formatRate(newSignups.filter((u) => u.card_linked).length, newSignups.length),
    new_signup_bank_rate: formatRate(newSignups.filter((u) => u.bank_linked).length, newSignups.length),
  });

  const report: DailyReport = Object.freeze({
    report_date: options.reportDate ?? null,
    total_events: partial.totalEvents,
    total_active_users: totalActive,
    new_signup_count: newSignups.length,

    signup_started: uniques('signup_started'),
    signup_completed: signupCompleted,
    signup_failed: uniques('signup_failed'),
    onboarding_completed: uniques('onboarding_completed'),
    card_success: cardSuccess,
    card_failed: uniques('card_link_failed'),
    bank_success: bankSuccess,
    bank_failed: uniques('bank_link_failed'),
    autopay_enabled: uniques('autopay_enabled'),
    income_added: uniques('income_added'),
    bill_payers: uniques('bill_payment'),
    churned: uniques('churned'),
    fraud_blocked: uniques('fraud_blocked'),
    credgpt_users: uniques('used_credgpt'),
    spinwheel_users: uniques('used_spinwheel'),
    rewards_users: uniques('used_rewards'),
    screen_viewers: uniques('screen_view'),

    card_linked_count: cardSuccess,
    bank_linked_count: bankSuccess,

    avg_session_mins: totalActive > 0 ? roundHalfEven(totalTimeSpent / totalActive, 1) : 0,
    malformed_events: partial.malformedEvents,
    untimed_events: partial.untimedEvents,

    rates,
    raw_event_counts: Object.freeze(Object.fromEntries(partial.rawEventCounts)),
    new_signups: Object.freeze(newSignups),
    all_users: Object.freeze(allUsers),
  });

  if (partial.malformedEvents > 0 || partial.untimedEvents > 0) {
    logger.warn('Some events were degraded during aggregation', {
      reportDate: report.report_date,
      malformedEvents: partial.malformedEvents,
      untimedEvents: partial.untimedEvents,
    });
  }

  logger.debug('Daily report assembled', {
    reportDate: report.report_date,
    totalEvents: report.total_events,
    totalActiveUsers: report.total_active_users,
    newSignups: report.new_signup_count,
  });

  return report;
}
