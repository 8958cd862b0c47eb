/**
 * Poller Type Definitions
 *
 * Shared interfaces and types for the presence polling system.
 * Separated from implementation for clean imports and testing.
 */

import type {
  DeviceKey,
  PollFailureKind,
  Presence,
  PresenceTransition,
  SchedulerState,
  SchedulerStatus,
} from '@dnspresence/shared';
import type { RawDeviceRecord } from '../../services/appliance/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Configuration for the poll scheduler
 */
export interface SchedulerConfig {
  /** Fixed tick interval in seconds */
  pollIntervalSeconds: number;
  /** Ceiling for the exponential backoff window, in seconds */
  maxBackoffSeconds: number;
}

/**
 * Configuration for the device reconciler
 */
export interface ReconcilerConfig {
  /** Silence longer than this marks a device away */
  awayThresholdSeconds: number;
  /** Vendor lookup for MACs the appliance did not resolve */
  lookupVendor?: (mac: string) => string | null;
}

// ============================================================================
// Device State
// ============================================================================

/**
 * Everything tracked about one physical device.
 * Created on first observation and never deleted during the process lifetime.
 */
export interface DeviceState {
  key: DeviceKey;
  mac: string | null;
  presence: Presence;
  name: string | null;
  /** Address -> poll time it was last reported at */
  ips: Map<string, Date>;
  firstSeen: Date;
  lastSeen: Date;
  lastQuery: Date | null;
  lastQuerySecondsAgo: number | null;
  numQueries: number | null;
  /** Resolved when the device is first seen, then cached */
  macVendor: string | null;
  dhcpExpires: Date | null;
  interface: string | null;
}

/**
 * One entry of a merge result, in table insertion order
 */
export interface PresenceUpdate {
  key: DeviceKey;
  /** Snapshot of the committed state; mutating it does not affect the table */
  state: Readonly<DeviceState>;
  transition: PresenceTransition | null;
}

/**
 * Contract between the scheduler and the reconciler
 */
export interface DeviceMerger {
  merge(records: RawDeviceRecord[], now: Date): PresenceUpdate[];
}

// ============================================================================
// Scheduler Events
// ============================================================================

export interface PollSuccessEvent {
  startedAt: Date;
  durationMs: number;
  devices: number;
  transitions: number;
}

export interface PollFailedEvent {
  startedAt: Date;
  kind: PollFailureKind;
  message: string;
  consecutiveFailures: number;
}

export interface PollSkippedEvent {
  at: Date;
  reason: 'overlap' | 'backoff' | 'paused';
}

export interface StateChangedEvent {
  from: SchedulerState;
  to: SchedulerState;
}

// Events emitted by PollScheduler for consumers
export interface PollSchedulerEvents {
  'poll:success': PollSuccessEvent;
  'poll:failed': PollFailedEvent;
  'poll:skipped': PollSkippedEvent;
  'state:changed': StateChangedEvent;
}

export type { SchedulerStatus };
