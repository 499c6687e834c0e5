import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import path from 'path';

// Load environment variables from .env file
dotenvConfig({ path: path.resolve(process.cwd(), '.env') });

// "false" must stay false, which z.coerce.boolean() does not guarantee
const envBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SERVICE_NAME: z.string().default('funnel-report'),

  // Daily Report Service
  DAILY_REPORT_PORT: z.coerce.number().int().positive().default(3010),
  DAILY_REPORT_HOST: z.string().default('0.0.0.0'),
  ALLOWED_ORIGINS: z.string().optional(),

  // Rate Limiting
  RATE_LIMIT_ENABLED: envBoolean.default('true'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(60),

  // Report ingestion
  REPORT_MAX_EVENTS: z.coerce.number().int().positive().default(500000),
  REPORT_BODY_LIMIT: z.string().default('200mb'),

  // Event taxonomy / screen tracking
  SCREEN_PROPERTY: z.string().min(1).default('screen_name'),
  SCREEN_FALLBACK_PROPERTY: z.string().min(1).default('screen'),
  USER_SCREEN_CAP: z.coerce.number().int().positive().default(12),
  COHORT_SCREEN_CAP: z.coerce.number().int().positive().default(12),

  // Monitoring
  METRICS_ENABLED: envBoolean.default('true'),
});

export type AppConfig = z.infer<typeof configSchema>;

export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => configSchema.parse(env);

// Parse and validate configuration
const Config = parseConfig(process.env);

export default Config;
export { Config };
