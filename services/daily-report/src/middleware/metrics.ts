import type { Request, Response, NextFunction } from 'express';
import promClient from 'prom-client';

// Create metrics registry
const register = new promClient.Registry();

promClient.collectDefaultMetrics({
  register,
  prefix: 'daily_report_',
});

const httpRequestDuration = new promClient.Histogram({
  name: 'daily_report_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

const httpRequestsTotal = new promClient.Counter({
  name: 'daily_report_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

const eventsAggregatedTotal = new promClient.Counter({
  name: 'daily_report_events_aggregated_total',
  help: 'Total number of export rows fed to the aggregator',
  labelNames: ['outcome'],
  registers: [register],
});

const reportsGeneratedTotal = new promClient.Counter({
  name: 'daily_report_reports_generated_total',
  help: 'Total number of daily reports generated',
  labelNames: ['source'],
  registers: [register],
});

const aggregationDuration = new promClient.Histogram({
  name: 'daily_report_aggregation_duration_seconds',
  help: 'Time spent reducing one batch into a report',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 60],
  registers: [register],
});

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const route: string = req.route?.path ?? req.path;
    const labels = { method: req.method, route, status_code: res.statusCode.toString() };

    httpRequestDuration.observe(labels, duration);
    httpRequestsTotal.inc(labels);
  });

  next();
};

export const getMetrics = (): Promise<string> => register.metrics();
export const metricsContentType = register.contentType;

export interface AggregationOutcome {
  source: 'json' | 'ndjson';
  aggregated: number;
  malformed: number;
  untimed: number;
  durationMs: number;
}

export const recordAggregation = (outcome: AggregationOutcome): void => {
  eventsAggregatedTotal.inc({ outcome: 'aggregated' }, outcome.aggregated);
  eventsAggregatedTotal.inc({ outcome: 'malformed' }, outcome.malformed);
  eventsAggregatedTotal.inc({ outcome: 'untimed' }, outcome.untimed);
  reportsGeneratedTotal.inc({ source: outcome.source });
  aggregationDuration.observe(outcome.durationMs / 1000);
};
