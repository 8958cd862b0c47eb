/**
 * Core type definitions for dnspresence
 */

// Presence classification derived from DNS query recency
export type Presence = 'home' | 'away';

// Transition reported alongside a merge result.
// null means a plain snapshot update (presence unchanged)
export type PresenceTransition = 'new' | 'arrived' | 'departed';

// Stable identity of a physical device across polls
export type DeviceKey = string;

// Appliance session lifecycle
export type SessionStatus = 'unauthenticated' | 'authenticated' | 'expired';

// Poll scheduler lifecycle
export type SchedulerState = 'idle' | 'polling' | 'backing_off' | 'paused' | 'stopped';

// Error classification surfaced by the poller
export type PollFailureKind = 'authentication' | 'unreachable' | 'malformed' | 'unknown';

/**
 * Attributes published for each device.
 * Timestamps are ISO-8601 strings, absent data is null.
 */
export interface DeviceAttributes {
  last_query: string | null;
  last_query_seconds_ago: number | null;
  first_seen: string;
  num_queries: number | null;
  mac_vendor: string | null;
  ips: string[];
  name: string | null;
  dhcp_expires: string | null;
  interface: string | null;
}

/**
 * Record handed to the presence sink for a single device
 */
export interface SinkRecord {
  key: DeviceKey;
  presence: Presence;
  transitioned: boolean;
  attributes: DeviceAttributes;
}

/**
 * Appliance availability as seen by the poller
 */
export interface ApplianceAvailability {
  available: boolean;
  reason: string | null;
  since: string;
}

/**
 * Snapshot of the poll scheduler
 */
export interface SchedulerStatus {
  state: SchedulerState;
  intervalSeconds: number;
  lastPollAt: string | null;
  lastSuccessAt: string | null;
  consecutiveFailures: number;
  lastFailure: { kind: PollFailureKind; message: string } | null;
  nextAttemptAt: string | null;
}

/**
 * Validated runtime configuration
 */
export interface TrackerConfig {
  host: string;
  password?: string;
  pollIntervalSeconds: number;
  awayThresholdSeconds: number;
  requestTimeoutMs: number;
  maxBackoffSeconds: number;
  recentQueryLimit: number;
}

// API response types
export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
}
