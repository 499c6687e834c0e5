import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { buildLogger, createServiceLogger, performanceLogger } from './logger';

describe('buildLogger', () => {
  it('takes its level and service name from the settings', () => {
    const logger = buildLogger({ NODE_ENV: 'production', LOG_LEVEL: 'warn', SERVICE_NAME: 'report-worker' });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('error')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.defaultMeta).toEqual({ service: 'report-worker', environment: 'production' });
  });

  it('logs to the console only', () => {
    const logger = buildLogger({ NODE_ENV: 'production', LOG_LEVEL: 'info', SERVICE_NAME: 'funnel-report' });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});

describe('performanceLogger.measure', () => {
  it('returns the result of the measured function', () => {
    expect(performanceLogger.measure('sum', () => 2 + 3)).toBe(5);
  });

  it('rethrows failures', () => {
    expect(() =>
      performanceLogger.measure('boom', () => {
        throw new Error('failed');
      })
    ).toThrow('failed');
  });
});

describe('createServiceLogger', () => {
  it('inherits the root level', () => {
    expect(createServiceLogger('daily-report').level).toBe('error');
  });
});
