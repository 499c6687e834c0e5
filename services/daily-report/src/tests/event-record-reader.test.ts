import { describe, it, expect } from 'vitest';
import { UNKNOWN_EVENT_TYPE, normalizeEventRecord, parseExportLines } from '../services/EventRecordReader';

describe('normalizeEventRecord', () => {
  it('reads the known fields and drops unusable ones', () => {
    const record = normalizeEventRecord({
      user_id: null,
      device_id: 'd1',
      event_type: 'common_screen_view_tracker',
      session_id: 1742032800000,
      event_time: '2025-03-15 10:00:00.123',
      event_properties: { screen_name: 'home', nested: { a: 1 }, visible: true },
      export_row_id: 99,
    });

    expect(record).toEqual({
      device_id: 'd1',
      event_type: 'common_screen_view_tracker',
      session_id: '1742032800000',
      event_time: '2025-03-15 10:00:00.123',
      event_properties: { screen_name: 'home', visible: true },
    });
  });

  it('substitutes a placeholder when the event type is missing', () => {
    expect(normalizeEventRecord({ user_id: 'u1' })?.event_type).toBe(UNKNOWN_EVENT_TYPE);
    expect(normalizeEventRecord({ user_id: 'u1', event_type: 7 })?.event_type).toBe('(unknown)');
  });

  it('treats empty strings and non-finite numbers as absent', () => {
    const record = normalizeEventRecord({
      user_id: '',
      event_type: 'x',
      session_id: Number.NaN,
      event_properties: ['not', 'a', 'map'],
    });

    expect(record?.user_id).toBeUndefined();
    expect(record?.session_id).toBeUndefined();
    expect(record?.event_properties).toBeUndefined();
  });

  it('rejects values that are not objects', () => {
    expect(normalizeEventRecord('event')).toBeNull();
    expect(normalizeEventRecord(undefined)).toBeNull();
    expect(normalizeEventRecord([{ event_type: 'x' }])).toBeNull();
  });
});

describe('parseExportLines', () => {
  it('decodes one record per line and skips undecodable lines', () => {
    const text = '{"event_type":"a"}\n\n  \nnot json\r\n{"event_type":"b"}\r\n{"event_type":';

    expect(parseExportLines(text)).toEqual({
      records: [{ event_type: 'a' }, { event_type: 'b' }],
      skippedLines: 2,
    });
  });

  it('returns nothing for an empty file', () => {
    expect(parseExportLines('')).toEqual({ records: [], skippedLines: 0 });
  });
});
