import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { AppConfig } from '@funnelreport/shared';
import type { AggregatorConfig } from './types';
import { healthRoutes } from './routes/health';
import { createReportRoutes } from './routes/reports';
import { metricsMiddleware, getMetrics, metricsContentType } from './middleware/metrics';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { skipLogger } from './middleware/requestLogger';

export type ServiceSettings = Pick<
  AppConfig,
  | 'ALLOWED_ORIGINS'
  | 'RATE_LIMIT_ENABLED'
  | 'RATE_LIMIT_WINDOW_MS'
  | 'RATE_LIMIT_MAX_REQUESTS'
  | 'REPORT_MAX_EVENTS'
  | 'REPORT_BODY_LIMIT'
  | 'METRICS_ENABLED'
>;

export const createApp = (settings: ServiceSettings, aggregatorConfig: AggregatorConfig): Express => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: settings.ALLOWED_ORIGINS?.split(',') ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Rate limiting
  if (settings.RATE_LIMIT_ENABLED) {
    const limiter = rateLimit({
      windowMs: settings.RATE_LIMIT_WINDOW_MS,
      max: settings.RATE_LIMIT_MAX_REQUESTS,
      message: {
        error: 'Too many requests from this IP',
        retryAfter: Math.ceil(settings.RATE_LIMIT_WINDOW_MS / 1000),
      },
      standardHeaders: true,
      legacyHeaders: false,
    });
    app.use('/v1/reports', limiter);
  }

  // Body parsing
  app.use(express.json({ limit: settings.REPORT_BODY_LIMIT }));

  app.use(skipLogger(['/health', '/health/*', '/metrics']));
  if (settings.METRICS_ENABLED) {
    app.use(metricsMiddleware);
  }

  // Routes
  app.use('/health', healthRoutes);
  app.use(
    '/v1/reports',
    createReportRoutes(aggregatorConfig, {
      maxEvents: settings.REPORT_MAX_EVENTS,
      bodyLimit: settings.REPORT_BODY_LIMIT,
    })
  );

  if (settings.METRICS_ENABLED) {
    app.get(
      '/metrics',
      asyncHandler(async (_req, res) => {
        res.set('Content-Type', metricsContentType);
        res.end(await getMetrics());
      })
    );
  }

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
