/**
 * Poller Module
 *
 * Background job that polls the DNS appliance and tracks device presence:
 * - Fixed-interval polling with overlap prevention
 * - Exponential backoff while the appliance is unreachable
 * - Pause on repeated authentication failure, resume with new credentials
 * - Stable device keys across IP and name changes
 * - Home/away decisions from DNS query recency (away after the silence threshold)
 *
 * @example
 * import { PollScheduler, DeviceReconciler } from './jobs/poller/index.js';
 *
 * const reconciler = new DeviceReconciler({ awayThresholdSeconds: 900, lookupVendor });
 * const scheduler = new PollScheduler(
 *   { pollIntervalSeconds: 30, maxBackoffSeconds: 300 },
 *   { sessions, source: client, reconciler, sink: store }
 * );
 * scheduler.start();
 *
 * // On shutdown
 * await scheduler.stop();
 */

// ============================================================================
// Public API - Lifecycle Management
// ============================================================================

export { PollScheduler, backoffMs, classifyPollFailure } from './scheduler.js';
export type { PollSchedulerDeps } from './scheduler.js';

// ============================================================================
// Reconciliation
// ============================================================================

export { DeviceReconciler, cloneState } from './reconciler.js';
export { computeDeviceKey, slugify } from './deviceKey.js';
export { toSinkRecord, toDeviceAttributes } from './sinkMapper.js';

// ============================================================================
// State Tracking Functions (exported for testing)
// ============================================================================

export {
  secondsSince,
  isFreshActivity,
  resolveAbsentPresence,
  detectTransition,
} from './stateTracker.js';

// ============================================================================
// Types
// ============================================================================

export type {
  SchedulerConfig,
  ReconcilerConfig,
  DeviceState,
  PresenceUpdate,
  DeviceMerger,
  PollSchedulerEvents,
  PollSuccessEvent,
  PollFailedEvent,
  PollSkippedEvent,
  StateChangedEvent,
} from './types.js';
