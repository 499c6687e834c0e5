import { ALL_ACTIVE } from '../types';
import type {
  AggregatorConfig,
  BucketKey,
  DailyReport,
  PartialAggregate,
  ReportOptions,
} from '../types';
import { ActionTaxonomy } from './ActionTaxonomy';
import { normalizeEventRecord } from './EventRecordReader';
import { resolveUserKey } from './IdentityResolver';
import { SessionWindowTracker } from './SessionWindowTracker';
import { UserStateAccumulator } from './UserStateAccumulator';
import { buildReport } from './ReportBuilder';
import { mergePartials } from './PartialAggregateMerger';

export interface AggregatorOptions {
  /** Position of this aggregator's first event within the whole batch. */
  sequenceOffset?: number;
}

/**
 * Single-pass reducer over one day of export rows.
 *
 * Each row is resolved to a user key, counted, added to the `all_active` bucket and
 * the raw tally, then (when it has both a session id and a parsable timestamp) used
 * to widen that session's window. Screen views record the screen, and the row's
 * action kind, if any, sets flags, bumps counters and joins its bucket. Rows that
 * are not objects are only counted as malformed.
 */
export class EventAggregator {
  private readonly taxonomy: ActionTaxonomy;
  private readonly sessions = new SessionWindowTracker();
  private readonly users: UserStateAccumulator;
  private readonly buckets = new Map<BucketKey, Set<string>>();
  private readonly rawEventCounts = new Map<string, number>();
  private sequence: number;
  private totalEvents = 0;
  private malformedEvents = 0;
  private untimedEvents = 0;

  constructor(config: AggregatorConfig, options: AggregatorOptions = {}) {
    this.taxonomy = new ActionTaxonomy(config.taxonomy);
    this.users = new UserStateAccumulator(config.screenProperty, config.screenFallbackProperty);
    this.sequence = options.sequenceOffset ?? 0;
  }

  ingest(value: unknown): void {
    const sequence = this.sequence++;
    const event = normalizeEventRecord(value);
    if (!event) {
      this.malformedEvents += 1;
      return;
    }

    const userId = resolveUserKey(event);
    const state = this.users.getOrCreate(userId);
    state.event_count += 1;
    this.totalEvents += 1;
    this.addToBucket(ALL_ACTIVE, userId);
    this.rawEventCounts.set(event.event_type, (this.rawEventCounts.get(event.event_type) ?? 0) + 1);

    const eventTime = this.sessions.parseEventTime(event.event_time);
    if (eventTime === null) {
      this.untimedEvents += 1;
    } else if (event.session_id !== undefined) {
      state.session_ids.add(event.session_id);
      this.sessions.widen(state.session_windows, event.session_id, eventTime);
    }

    const kind = this.taxonomy.classify(event.event_type);
    if (kind === undefined) {
      return;
    }

    if (kind === 'screen_view') {
      const screen = this.users.extractScreen(event);
      if (screen !== undefined) {
        this.users.recordScreen(state, screen, { firstSeenAt: eventTime, sequence });
      }
    }

    this.users.apply(state, kind);
    this.addToBucket(kind, userId);
  }

  ingestAll(values: Iterable<unknown>): this {
    for (const value of values) {
      this.ingest(value);
    }
    return this;
  }

  snapshot(): PartialAggregate {
    return {
      users: this.users.entries(),
      buckets: this.buckets,
      rawEventCounts: this.rawEventCounts,
      totalEvents: this.totalEvents,
      malformedEvents: this.malformedEvents,
      untimedEvents: this.untimedEvents,
    };
  }

  private addToBucket(key: BucketKey, userId: string): void {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new Set();
      this.buckets.set(key, bucket);
    }
    bucket.add(userId);
  }
}

export function aggregateEvents(
  events: Iterable<unknown>,
  config: AggregatorConfig,
  options: ReportOptions = {}
): DailyReport {
  const partial = new EventAggregator(config).ingestAll(events).snapshot();
  return buildReport(partial, config, options);
}

/**
 * Splits the batch into contiguous partitions, aggregates each on its own and
 * merges the partial results. Produces the same report as `aggregateEvents`.
 */
export function aggregatePartitioned(
  events: readonly unknown[],
  config: AggregatorConfig,
  partitionCount: number,
  options: ReportOptions = {}
): DailyReport {
  const partitions = Math.max(1, Math.floor(partitionCount));
  const size = Math.max(1, Math.ceil(events.length / partitions));

  const partials: PartialAggregate[] = [];
  for (let offset = 0; offset < events.length; offset += size) {
    const aggregator = new EventAggregator(config, { sequenceOffset: offset });
    partials.push(aggregator.ingestAll(events.slice(offset, offset + size)).snapshot());
  }

  return buildReport(mergePartials(partials), config, options);
}
