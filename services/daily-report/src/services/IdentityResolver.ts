import type { EventRecord } from '../types';

/** Shared key for events that carry neither a user id nor a device id. */
export const ANONYMOUS_USER_KEY = 'anonymous';

/**
 * Canonical user key: user id, else device id, else the shared anonymous key.
 * Every device without an identity lands in the same anonymous entry.
 */
export function resolveUserKey(event: Pick<EventRecord, 'user_id' | 'device_id'>): string {
  if (event.user_id) {
    return event.user_id;
  }
  if (event.device_id) {
    return event.device_id;
  }
  return ANONYMOUS_USER_KEY;
}
