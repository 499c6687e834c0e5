import { z } from 'zod';
import { logger } from '@funnelreport/shared';
import type { EventPropertyValue, EventRecord } from '../types';

/** Placeholder event type for rows that carry none. */
export const UNKNOWN_EVENT_TYPE = '(unknown)';

const optionalText = z.string().min(1).optional().catch(undefined);

const sessionIdSchema = z
  .union([z.string().min(1), z.number().finite().transform(String)])
  .optional()
  .catch(undefined);

const isScalar = (value: unknown): value is EventPropertyValue =>
  value === null || ['string', 'number', 'boolean'].includes(typeof value);

const propertiesSchema = z
  .record(z.unknown())
  .transform((properties) => {
    const scalars: Record<string, EventPropertyValue> = {};
    for (const [key, value] of Object.entries(properties)) {
      if (isScalar(value)) {
        scalars[key] = value;
      }
    }
    return scalars;
  })
  .optional()
  .catch(undefined);

// Field-by-field lookups: a bad field degrades to "absent", never rejects the row
const eventRecordSchema = z.object({
  user_id: optionalText,
  device_id: optionalText,
  event_type: z.string().min(1).catch(UNKNOWN_EVENT_TYPE),
  session_id: sessionIdSchema,
  event_time: optionalText,
  event_properties: propertiesSchema,
});

/**
 * Reads an export row defensively. Returns null only when the row is not an object
 * at all; every other problem leaves the affected field empty.
 */
export function normalizeEventRecord(value: unknown): EventRecord | null {
  const result = eventRecordSchema.safeParse(value);
  return result.success ? result.data : null;
}

export interface ExportLines {
  records: unknown[];
  skippedLines: number;
}

/**
 * Decodes newline-delimited JSON from an already decompressed export file.
 * Blank lines are ignored and lines that are not JSON are skipped.
 */
export function parseExportLines(text: string): ExportLines {
  const records: unknown[] = [];
  let skippedLines = 0;

  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) {
      return;
    }
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      skippedLines += 1;
      logger.debug('Skipping undecodable export line', {
        line: index + 1,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return { records, skippedLines };
}
