import { differenceInMilliseconds, isValid, parseISO } from 'date-fns';
import type { SessionWindow } from '../types';
import { roundHalfEven } from '../utils/rounding';

// "2025-03-15 10:00:00" or "2025-03-15 10:00:00.123456", always UTC
const EVENT_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})(\.\d{1,6})?$/;

export class SessionWindowTracker {
  /**
   * Parses an export timestamp to epoch milliseconds. Anything outside the two
   * export formats, or an impossible calendar value, yields null.
   */
  parseEventTime(value: string | undefined): number | null {
    if (value === undefined) {
      return null;
    }

    const match = EVENT_TIME_PATTERN.exec(value);
    if (!match) {
      return null;
    }

    const [, day, clock, fraction = ''] = match;
    if (clock.startsWith('24')) {
      return null;
    }

    const parsed = parseISO(`${day}T${clock}${fraction}Z`);
    return isValid(parsed) ? parsed.getTime() : null;
  }

  /**
   * Widens the window of `sessionId` so that it covers `at`. A session seen for the
   * first time starts as a zero-length window.
   */
  widen(windows: Map<string, SessionWindow>, sessionId: string, at: number): void {
    const window = windows.get(sessionId);
    if (!window) {
      windows.set(sessionId, { start: at, end: at });
      return;
    }
    if (at < window.start) window.start = at;
    if (at > window.end) window.end = at;
  }

  /** Folds `source` into `target` window by window (min start, max end). */
  merge(target: Map<string, SessionWindow>, source: ReadonlyMap<string, SessionWindow>): void {
    for (const [sessionId, window] of source) {
      this.widen(target, sessionId, window.start);
      this.widen(target, sessionId, window.end);
    }
  }

  /** Total minutes across all sessions, rounded half-to-even to one decimal. */
  timeSpentMins(windows: ReadonlyMap<string, SessionWindow>): number {
    let totalMs = 0;
    for (const window of windows.values()) {
      totalMs += differenceInMilliseconds(window.end, window.start);
    }
    return roundHalfEven(totalMs / 1000 / 60, 1);
  }
}

