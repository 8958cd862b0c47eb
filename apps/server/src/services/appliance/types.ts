/**
 * Appliance Integration Types
 *
 * Normalized shapes produced from the Pi-hole v6 management API.
 * Absent data is always null so consumers can tell "no data" from "zero".
 */

import type { SessionStatus } from '@dnspresence/shared';

// ============================================================================
// Session Types
// ============================================================================

/**
 * Authenticated appliance session.
 * A null sid with status 'authenticated' means the appliance has no password set.
 */
export interface ApplianceSession {
  sid: string | null;
  status: SessionStatus;
  issuedAt: Date;
  /** null when the appliance reports no expiry */
  expiresAt: Date | null;
  /** Sliding validity window reported by the appliance, in seconds */
  validitySeconds: number | null;
}

// ============================================================================
// Device Types
// ============================================================================

/**
 * One device as reported by a single poll, after joining the network table,
 * recent query summary and DHCP leases
 */
export interface RawDeviceRecord {
  /** Lower-case, colon separated; null when the appliance has no MAC for it */
  mac: string | null;
  /** Identifying address first for MAC-less devices */
  ips: string[];
  name: string | null;
  dhcpExpires: Date | null;
  interface: string | null;
  lastQuery: Date | null;
  numQueries: number | null;
  /** Vendor string the appliance resolved itself, if any */
  macVendor: string | null;
}

/**
 * Per-client aggregate of the recent query log
 */
export interface QuerySummaryEntry {
  ip: string;
  name: string | null;
  lastQuery: Date;
  count: number;
}

/**
 * DHCP lease entry
 */
export interface DhcpLease {
  mac: string | null;
  ip: string;
  name: string | null;
  expires: Date | null;
}

// ============================================================================
// Client Interface
// ============================================================================

/**
 * Source of raw device records for a poll
 */
export interface DeviceSource {
  fetchDevices(session: ApplianceSession, signal?: AbortSignal): Promise<RawDeviceRecord[]>;
}

/**
 * Outcome of a setup-time connection test
 */
export type ConnectionTestResult = 'ok' | 'invalid_auth' | 'cannot_connect' | 'unknown';
