import { describe, it, expect } from 'vitest';
import { ActionTaxonomy } from '../services/ActionTaxonomy';
import { DEFAULT_TAXONOMY, buildAggregatorConfig, buildTaxonomy, taxonomyEnvKey } from '../config/taxonomy';

describe('ActionTaxonomy', () => {
  const taxonomy = new ActionTaxonomy(DEFAULT_TAXONOMY);

  it('maps synonyms onto one action kind', () => {
    expect(taxonomy.classify('credgpt_started')).toBe('used_credgpt');
    expect(taxonomy.classify('credgpt_ended')).toBe('used_credgpt');
  });

  it('matches exactly and case-sensitively', () => {
    expect(taxonomy.classify('add_card_successful')).toBe('card_link_success');
    expect(taxonomy.classify('Add_Card_Successful')).toBeUndefined();
    expect(taxonomy.classify('add_card_successful ')).toBeUndefined();
  });

  it('returns undefined for event types outside the table', () => {
    expect(taxonomy.classify('app_opened')).toBeUndefined();
  });

  it('keeps the first declared kind when a raw name is listed twice', () => {
    const overlapping = new ActionTaxonomy({
      ...DEFAULT_TAXONOMY,
      screen_view: ['common_screen_view_tracker', 'add_card_successful'],
    });

    expect(overlapping.classify('add_card_successful')).toBe('card_link_success');
    expect(overlapping.size).toBe(taxonomy.size);
  });
});

describe('buildTaxonomy', () => {
  it('derives the environment key from the kind', () => {
    expect(taxonomyEnvKey('card_link_success')).toBe('TAXONOMY_CARD_LINK_SUCCESS');
  });

  it('replaces the raw names of an overridden kind only', () => {
    const table = buildTaxonomy({ TAXONOMY_SIGNUP_COMPLETED: 'Sign Up Complete, signup_done' });

    expect(table.signup_completed).toEqual(['Sign Up Complete', 'signup_done']);
    expect(table.card_link_success).toEqual(['add_card_successful']);
  });

  it('rejects an override without any event type', () => {
    expect(() => buildTaxonomy({ TAXONOMY_CHURNED: ' , ' })).toThrow(
      'Invalid TAXONOMY_CHURNED: expected a comma-separated list of event types'
    );
  });

  it('produces a frozen aggregator configuration', () => {
    const config = buildAggregatorConfig(
      {
        SCREEN_PROPERTY: 'screen_name',
        SCREEN_FALLBACK_PROPERTY: 'screen',
        USER_SCREEN_CAP: 12,
        COHORT_SCREEN_CAP: 5,
      },
      {}
    );

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.taxonomy)).toBe(true);
    expect(config.cohortScreenCap).toBe(5);
    expect(config.taxonomy).toEqual(DEFAULT_TAXONOMY);
  });
});
