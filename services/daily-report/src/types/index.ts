export type EventPropertyValue = string | number | boolean | null;

/**
 * One decoded analytics export row. Every field is optional except `event_type`,
 * which is filled with a placeholder when the export omits it.
 */
export interface EventRecord {
  user_id?: string;
  device_id?: string;
  event_type: string;
  session_id?: string;
  event_time?: string;
  event_properties?: Record<string, EventPropertyValue>;
}

export const ACTION_KINDS = [
  'signup_started',
  'signup_completed',
  'signup_failed',
  'onboarding_completed',
  'card_link_success',
  'card_link_failed',
  'bank_link_success',
  'bank_link_failed',
  'autopay_enabled',
  'income_added',
  'bill_payment',
  'churned',
  'fraud_blocked',
  'used_credgpt',
  'used_spinwheel',
  'used_rewards',
  'screen_view',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export const ALL_ACTIVE = 'all_active';
export type BucketKey = ActionKind | typeof ALL_ACTIVE;

/** Canonical action kind -> raw event types accepted for it. Declaration order is match priority. */
export type TaxonomyTable = Readonly<Record<ActionKind, readonly string[]>>;

export interface AggregatorConfig {
  readonly taxonomy: TaxonomyTable;
  readonly screenProperty: string;
  readonly screenFallbackProperty: string;
  readonly userScreenCap: number;
  readonly cohortScreenCap: number;
}

/** Epoch milliseconds, UTC. */
export interface SessionWindow {
  start: number;
  end: number;
}

export interface ScreenSighting {
  firstSeenAt: number | null;
  sequence: number;
}

export const USER_FLAGS = [
  'signup_started',
  'signup_completed',
  'signup_failed',
  'onboarding_completed',
  'card_linked',
  'card_link_failed',
  'bank_linked',
  'bank_link_failed',
  'autopay_enabled',
  'income_added',
  'churned',
  'fraud_blocked',
  'used_credgpt',
  'used_spinwheel',
  'used_rewards',
] as const;

export type UserFlag = (typeof USER_FLAGS)[number];

export const ACTION_COUNTERS = ['cards_count', 'banks_count', 'bill_payments_made'] as const;
export type ActionCounter = (typeof ACTION_COUNTERS)[number];

export type UserFlags = Record<UserFlag, boolean>;
export type UserCounters = Record<ActionCounter | 'event_count', number>;

export interface UserState extends UserFlags, UserCounters {
  user_id: string;
  screens: Map<string, ScreenSighting>;
  session_ids: Set<string>;
  session_windows: Map<string, SessionWindow>;
}

/**
 * Result of one aggregation pass, before any rate is derived. Partitions of the
 * same batch produce partial aggregates that can be merged.
 */
export interface PartialAggregate {
  users: Map<string, UserState>;
  buckets: Map<BucketKey, Set<string>>;
  rawEventCounts: Map<string, number>;
  totalEvents: number;
  malformedEvents: number;
  untimedEvents: number;
}

export interface CohortRecord extends Readonly<UserFlags>, Readonly<UserCounters> {
  readonly user_id: string;
  readonly screens: readonly string[];
  readonly screens_visited_count: number;
  readonly time_spent_mins: number;
  readonly session_count: number;
}

/** `"<int>%"`, or `"—"` when the denominator is zero. */
export type RateString = string;

export interface ReportRates {
  readonly signup_completion_rate: RateString;
  readonly signup_failure_rate: RateString;
  readonly onboarding_rate: RateString;
  readonly card_link_success_rate: RateString;
  readonly bank_link_success_rate: RateString;
  readonly new_signup_card_rate: RateString;
  readonly new_signup_bank_rate: RateString;
}

export interface DailyReport {
  readonly report_date: string | null;
  readonly total_events: number;
  readonly total_active_users: number;
  readonly new_signup_count: number;

  readonly signup_started: number;
  readonly signup_completed: number;
  readonly signup_failed: number;
  readonly onboarding_completed: number;
  readonly card_success: number;
  readonly card_failed: number;
  readonly bank_success: number;
  readonly bank_failed: number;
  readonly autopay_enabled: number;
  readonly income_added: number;
  readonly bill_payers: number;
  readonly churned: number;
  readonly fraud_blocked: number;
  readonly credgpt_users: number;
  readonly spinwheel_users: number;
  readonly rewards_users: number;
  readonly screen_viewers: number;

  // Kept under the names the narrative and e-mail consumers read
  readonly card_linked_count: number;
  readonly bank_linked_count: number;

  readonly avg_session_mins: number;
  readonly malformed_events: number;
  readonly untimed_events: number;

  readonly rates: ReportRates;
  readonly raw_event_counts: Readonly<Record<string, number>>;
  readonly new_signups: readonly CohortRecord[];
  readonly all_users: readonly CohortRecord[];
}

export interface ReportOptions {
  reportDate?: string;
}
