import { z } from 'zod';
import type { AppConfig } from '@funnelreport/shared';
import { ACTION_KINDS } from '../types';
import type { ActionKind, AggregatorConfig, TaxonomyTable } from '../types';

export const DEFAULT_TAXONOMY: TaxonomyTable = Object.freeze({
  signup_started: ['signup_started'],
  signup_completed: ['signup_completed'],
  signup_failed: ['signup_failed'],
  onboarding_completed: ['onboarding_completed'],
  card_link_success: ['add_card_successful'],
  card_link_failed: ['add_card_failed'],
  bank_link_success: ['add_bank_successful'],
  bank_link_failed: ['add_bank_failed'],
  autopay_enabled: ['autopay_enabled'],
  income_added: ['income_added'],
  bill_payment: ['bill_payment_successful'],
  churned: ['account_deleted'],
  fraud_blocked: ['fraud_blocked'],
  used_credgpt: ['credgpt_started', 'credgpt_ended'],
  used_spinwheel: ['spinwheel_played'],
  used_rewards: ['reward_redeemed'],
  screen_view: ['common_screen_view_tracker'],
});

// "Sign Up Complete, signup_completed" -> ["Sign Up Complete", "signup_completed"]
const rawNameList = z
  .string()
  .transform((value) => value.split(',').map((name) => name.trim()).filter(Boolean))
  .pipe(z.array(z.string()).min(1));

export const taxonomyEnvKey = (kind: ActionKind): string => `TAXONOMY_${kind.toUpperCase()}`;

/**
 * Applies `TAXONOMY_<KIND>` overrides from the environment on top of the default
 * table. An override replaces the default raw names for that kind.
 */
export function buildTaxonomy(
  env: NodeJS.ProcessEnv,
  base: TaxonomyTable = DEFAULT_TAXONOMY
): TaxonomyTable {
  const table: Record<ActionKind, readonly string[]> = { ...base };
  for (const kind of ACTION_KINDS) {
    const key = taxonomyEnvKey(kind);
    const override = env[key];
    if (override === undefined) continue;

    const parsed = rawNameList.safeParse(override);
    if (!parsed.success) {
      throw new Error(`Invalid ${key}: expected a comma-separated list of event types`);
    }
    table[kind] = Object.freeze(parsed.data);
  }
  return Object.freeze(table);
}

export type ScreenSettings = Pick<
  AppConfig,
  'SCREEN_PROPERTY' | 'SCREEN_FALLBACK_PROPERTY' | 'USER_SCREEN_CAP' | 'COHORT_SCREEN_CAP'
>;

/** Immutable aggregation settings, resolved once when the service starts. */
export function buildAggregatorConfig(
  settings: ScreenSettings,
  env: NodeJS.ProcessEnv = process.env
): AggregatorConfig {
  return Object.freeze({
    taxonomy: buildTaxonomy(env),
    screenProperty: settings.SCREEN_PROPERTY,
    screenFallbackProperty: settings.SCREEN_FALLBACK_PROPERTY,
    userScreenCap: settings.USER_SCREEN_CAP,
    cohortScreenCap: settings.COHORT_SCREEN_CAP,
  });
}
