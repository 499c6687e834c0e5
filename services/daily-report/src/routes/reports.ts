import express, { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { logger, performanceLogger } from '@funnelreport/shared';
import type { AggregatorConfig, DailyReport } from '../types';
import { aggregateEvents } from '../services/EventAggregator';
import { parseExportLines } from '../services/EventRecordReader';
import { createError } from '../middleware/errorHandler';
import { recordAggregation } from '../middleware/metrics';

const reportDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD')
  .refine((value) => isValid(parseISO(value)), 'date is not a calendar day');

const dailyReportBodySchema = z.object({
  date: reportDateSchema.optional(),
  events: z.array(z.unknown()),
});

const ndjsonQuerySchema = z.object({
  date: reportDateSchema.optional(),
});

export interface ReportRouteOptions {
  maxEvents: number;
  bodyLimit: string;
}

const describeIssues = (error: z.ZodError) =>
  error.issues.map((issue) => ({ field: issue.path.join('.') || '(body)', message: issue.message }));

export const createReportRoutes = (
  aggregatorConfig: AggregatorConfig,
  options: ReportRouteOptions
): Router => {
  const router = Router();

  const runAggregation = (
    source: 'json' | 'ndjson',
    events: unknown[],
    reportDate: string | undefined
  ): DailyReport => {
    if (events.length > options.maxEvents) {
      throw createError(`Batch too large: maximum ${options.maxEvents} events per report`, 413);
    }

    const startTime = Date.now();
    const report = performanceLogger.measure(`daily report ${reportDate ?? '(undated)'}`, () =>
      aggregateEvents(events, aggregatorConfig, { reportDate })
    );

    recordAggregation({
      source,
      aggregated: report.total_events,
      malformed: report.malformed_events,
      untimed: report.untimed_events,
      durationMs: Date.now() - startTime,
    });

    logger.info('Daily report generated', {
      reportDate: report.report_date,
      source,
      totalEvents: report.total_events,
      activeUsers: report.total_active_users,
      newSignups: report.new_signup_count,
    });

    return report;
  };

  // POST /v1/reports/daily - Reduce a JSON batch of export rows
  router.post('/daily', (req: Request, res: Response, next: NextFunction) => {
    const parsed = dailyReportBodySchema.safeParse(req.body);
    if (!parsed.success) {
      next(createError('Invalid payload', 400, describeIssues(parsed.error)));
      return;
    }

    const report = runAggregation('json', parsed.data.events, parsed.data.date);
    res.status(200).json({
      status: 'success',
      report,
      processed_at: new Date().toISOString(),
    });
  });

  // POST /v1/reports/daily/ndjson - Reduce a decompressed export file
  router.post(
    '/daily/ndjson',
    express.text({ type: ['application/x-ndjson', 'text/plain'], limit: options.bodyLimit }),
    (req: Request, res: Response, next: NextFunction) => {
      const query = ndjsonQuerySchema.safeParse(req.query);
      if (!query.success) {
        next(createError('Invalid query', 400, describeIssues(query.error)));
        return;
      }
      if (typeof req.body !== 'string') {
        next(createError('Expected an application/x-ndjson body', 415));
        return;
      }

      const { records, skippedLines } = parseExportLines(req.body);
      const report = runAggregation('ndjson', records, query.data.date);
      res.status(200).json({
        status: 'success',
        report,
        skipped_lines: skippedLines,
        processed_at: new Date().toISOString(),
      });
    }
  );

  return router;
};
