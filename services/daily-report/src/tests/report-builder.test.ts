import { describe, it, expect } from 'vitest';
import { NO_RATE, buildReport, formatRate } from '../services/ReportBuilder';
import { createUserState } from '../services/UserStateAccumulator';
import { ALL_ACTIVE } from '../types';
import type { BucketKey, PartialAggregate } from '../types';
import { makeConfig } from './helpers';

describe('formatRate', () => {
  it('renders the zero-denominator sentinel', () => {
    expect(formatRate(0, 0)).toBe(NO_RATE);
    expect(formatRate(3, 0)).toBe('—');
  });

  it('renders a whole percentage, halves to even', () => {
    expect(formatRate(0, 5)).toBe('0%');
    expect(formatRate(2, 3)).toBe('67%');
    expect(formatRate(1, 3)).toBe('33%');
    expect(formatRate(1, 8)).toBe('12%');
    expect(formatRate(3, 8)).toBe('38%');
    expect(formatRate(5, 5)).toBe('100%');
  });
});

describe('buildReport', () => {
  const partialWith = (users: string[], buckets: Array<[BucketKey, string[]]>): PartialAggregate => ({
    users: new Map(users.map((id) => [id, createUserState(id)])),
    buckets: new Map(buckets.map(([key, ids]) => [key, new Set(ids)])),
    rawEventCounts: new Map(),
    totalEvents: users.length,
    malformedEvents: 0,
    untimedEvents: 0,
  });

  it('uses the union of successful and failed users as the link-attempt denominator', () => {
    const partial = partialWith(
      ['a', 'b', 'c'],
      [
        [ALL_ACTIVE, ['a', 'b', 'c']],
        ['card_link_success', ['a', 'b']],
        ['card_link_failed', ['b', 'c']],
        ['bank_link_failed', ['a']],
      ]
    );
    const report = buildReport(partial, makeConfig());

    expect(report.card_success).toBe(2);
    expect(report.card_failed).toBe(2);
    expect(report.rates.card_link_success_rate).toBe('67%');
    expect(report.rates.bank_link_success_rate).toBe('0%');
  });

  it('derives signup and onboarding rates from unique users', () => {
    const partial = partialWith(
      ['a', 'b', 'c', 'd'],
      [
        [ALL_ACTIVE, ['a', 'b', 'c', 'd']],
        ['signup_started', ['a', 'b', 'c', 'd']],
        ['signup_completed', ['a', 'b', 'c']],
        ['signup_failed', ['d']],
        ['onboarding_completed', ['a']],
      ]
    );
    const report = buildReport(partial, makeConfig());

    expect(report.rates.signup_completion_rate).toBe('75%');
    expect(report.rates.signup_failure_rate).toBe('25%');
    expect(report.rates.onboarding_rate).toBe('33%');
  });

  it('averages time spent over every active user', () => {
    const partial = partialWith(['a', 'b', 'c'], [[ALL_ACTIVE, ['a', 'b', 'c']]]);
    partial.users.get('a')?.session_windows.set('s1', { start: 0, end: 3 * 60_000 });
    partial.users.get('b')?.session_windows.set('s1', { start: 0, end: 60_000 });

    // (3 + 1 + 0) / 3
    expect(buildReport(partial, makeConfig()).avg_session_mins).toBe(1.3);
  });

  it('passes the report date and degradation counters through', () => {
    const partial = partialWith([], []);
    partial.malformedEvents = 2;
    partial.untimedEvents = 5;
    partial.rawEventCounts.set('app_opened', 7);

    const report = buildReport(partial, makeConfig(), { reportDate: '2025-03-15' });

    expect(report.report_date).toBe('2025-03-15');
    expect(report.malformed_events).toBe(2);
    expect(report.untimed_events).toBe(5);
    expect(report.raw_event_counts).toEqual({ app_opened: 7 });
    expect(report.total_active_users).toBe(0);
  });
});
