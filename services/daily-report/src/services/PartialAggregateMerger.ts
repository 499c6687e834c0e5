import type { PartialAggregate } from '../types';
import { SessionWindowTracker } from './SessionWindowTracker';
import { createUserState, mergeUserStates } from './UserStateAccumulator';

const sessions = new SessionWindowTracker();

/**
 * Merges partial aggregates of one batch into a fresh aggregate. Inputs are not
 * modified. Screen order survives because each sighting carries its own event time
 * and batch position.
 */
export function mergePartials(partials: readonly PartialAggregate[]): PartialAggregate {
  const merged: PartialAggregate = {
    users: new Map(),
    buckets: new Map(),
    rawEventCounts: new Map(),
    totalEvents: 0,
    malformedEvents: 0,
    untimedEvents: 0,
  };

  for (const partial of partials) {
    for (const [userId, source] of partial.users) {
      let target = merged.users.get(userId);
      if (!target) {
        target = createUserState(userId);
        merged.users.set(userId, target);
      }
      mergeUserStates(target, source);
      sessions.merge(target.session_windows, source.session_windows);
    }

    for (const [key, members] of partial.buckets) {
      const bucket = merged.buckets.get(key) ?? new Set<string>();
      members.forEach((userId) => bucket.add(userId));
      merged.buckets.set(key, bucket);
    }

    for (const [eventType, count] of partial.rawEventCounts) {
      merged.rawEventCounts.set(eventType, (merged.rawEventCounts.get(eventType) ?? 0) + count);
    }

    merged.totalEvents += partial.totalEvents;
    merged.malformedEvents += partial.malformedEvents;
    merged.untimedEvents += partial.untimedEvents;
  }

  return merged;
}
