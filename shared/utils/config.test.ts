import { describe, it, expect } from 'vitest';
import { parseConfig } from './config';

describe('parseConfig', () => {
  it('fills defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.DAILY_REPORT_PORT).toBe(3010);
    expect(config.SCREEN_PROPERTY).toBe('screen_name');
    expect(config.SCREEN_FALLBACK_PROPERTY).toBe('screen');
    expect(config.USER_SCREEN_CAP).toBe(12);
    expect(config.METRICS_ENABLED).toBe(true);
  });

  it('reads "false" as false for boolean flags', () => {
    const config = parseConfig({ METRICS_ENABLED: 'false', RATE_LIMIT_ENABLED: '0' });

    expect(config.METRICS_ENABLED).toBe(false);
    expect(config.RATE_LIMIT_ENABLED).toBe(false);
  });

  it('coerces numeric settings', () => {
    expect(parseConfig({ COHORT_SCREEN_CAP: '5' }).COHORT_SCREEN_CAP).toBe(5);
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ USER_SCREEN_CAP: '0' })).toThrow();
    expect(() => parseConfig({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
