/**
 * Shared constants for dnspresence
 */

// Polling defaults and floors
export const POLLING_DEFAULTS = {
  INTERVAL_SECONDS: 30,
  // Minimum interval - anything faster overloads the appliance
  MIN_INTERVAL_SECONDS: 5,
  AWAY_THRESHOLD_SECONDS: 900,
  // Exponential backoff ceiling for unreachable appliance
  MAX_BACKOFF_SECONDS: 300,
  // Bound on how long stop() waits for an in-flight poll
  SHUTDOWN_TIMEOUT_MS: 5000,
} as const;

// Appliance request settings
export const APPLIANCE_LIMITS = {
  REQUEST_TIMEOUT_MS: 10000,
  // Recent queries pulled per poll for the per-client summary
  RECENT_QUERY_LIMIT: 1000,
  MAX_DEVICES: 999,
  MAX_ADDRESSES: 24,
  // Treat a session as expired slightly before the appliance does
  SESSION_EXPIRY_MARGIN_MS: 5000,
} as const;

// Pi-hole v6 API paths
export const APPLIANCE_API = {
  AUTH: '/api/auth',
  NETWORK_DEVICES: '/api/network/devices',
  QUERIES: '/api/queries',
  DHCP_LEASES: '/api/dhcp/leases',
  SID_HEADER: 'X-FTL-SID',
} as const;

// Device key construction
export const DEVICE_KEY = {
  // Label used when a device has never reported a name
  FALLBACK_LABEL: 'device',
  MAC_SUFFIX_LENGTH: 4,
  SEPARATOR: '_',
  // Marks address-based keys that would clash with a MAC-based key
  ADDRESS_TAG: 'ip',
} as const;

// Poller event names
export const POLLER_EVENTS = {
  POLL_SUCCESS: 'poll:success',
  POLL_FAILED: 'poll:failed',
  POLL_SKIPPED: 'poll:skipped',
  STATE_CHANGED: 'state:changed',
} as const;

// API version
export const API_VERSION = 'v1';
export const API_BASE_PATH = `/api/${API_VERSION}`;
