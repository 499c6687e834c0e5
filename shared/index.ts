// Funnel Report Shared - configuration and logging used by every service

export { default as Config } from './utils/config';
export type { AppConfig } from './utils/config';
export { createServiceLogger, performanceLogger, errorLogger } from './utils/logger';

import { createServiceLogger } from './utils/logger';
export const logger = createServiceLogger('shared');

export const SERVICE_NAMES = {
  DAILY_REPORT: 'daily-report',
} as const;

export const VERSION = '1.0.0';
