/**
 * Presence State Tracking
 *
 * Pure functions for activity freshness, presence decisions and transition
 * detection. All times are compared in whole seconds against the poll time.
 */

import type { Presence, PresenceTransition } from '@dnspresence/shared';
import type { DeviceState } from './types.js';

/**
 * Seconds elapsed between a timestamp and now, floored and clamped to zero
 *
 * @example
 * secondsSince(new Date('2024-01-01T10:00:00Z'), new Date('2024-01-01T10:01:30.900Z')) // 90
 * secondsSince(null, now) // null
 */
export function secondsSince(then: Date | null, now: Date): number | null {
  if (then === null) return null;
  return Math.max(0, Math.floor((now.getTime() - then.getTime()) / 1000));
}

/**
 * Whether a polled record counts as present.
 * Unknown activity is treated as fresh (the appliance listed the device without a time).
 */
export function isFreshActivity(
  lastQuery: Date | null,
  now: Date,
  awayThresholdSeconds: number
): boolean {
  const elapsed = secondsSince(lastQuery, now);
  return elapsed === null || elapsed <= awayThresholdSeconds;
}

/**
 * Presence of a device without fresh activity this poll.
 * Away once the silence is strictly longer than the threshold, otherwise unchanged.
 *
 * @example
 * // threshold 900s, last query 901s ago
 * resolveAbsentPresence({ presence: 'home', lastQuery, lastSeen }, now, 900) // 'away'
 * // last query exactly 900s ago
 * resolveAbsentPresence({ presence: 'home', lastQuery, lastSeen }, now, 900) // 'home'
 */
export function resolveAbsentPresence(
  state: Pick<DeviceState, 'presence' | 'lastQuery' | 'lastSeen'>,
  now: Date,
  awayThresholdSeconds: number
): Presence {
  const elapsed = secondsSince(state.lastQuery ?? state.lastSeen, now) ?? 0;
  return elapsed > awayThresholdSeconds ? 'away' : state.presence;
}

/**
 * Transition between the committed presence and the merged one.
 * undefined means the device had no committed state before this merge.
 */
export function detectTransition(
  previous: Presence | undefined,
  next: Presence
): PresenceTransition | null {
  if (previous === undefined) return 'new';
  if (previous === 'away' && next === 'home') return 'arrived';
  if (previous === 'home' && next === 'away') return 'departed';
  return null;
}

/**
 * Drop addresses not reported since before the previous merge
 */
export function pruneStaleAddresses(ips: Map<string, Date>, previousMergeAt: Date | null): void {
  if (previousMergeAt === null) return;
  for (const [ip, seenAt] of ips) {
    if (seenAt.getTime() < previousMergeAt.getTime()) {
      ips.delete(ip);
    }
  }
}
