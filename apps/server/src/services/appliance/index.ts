/**
 * Appliance Integration Module
 *
 * @example
 * import { createApplianceServices } from './services/appliance/index.js';
 *
 * const services = createApplianceServices(config);
 * await checkApplianceConnection(services);
 * const { sessions, client } = services;
 * const records = await sessions.withSession((session) => client.fetchDevices(session));
 */

import type { TrackerConfig } from '@dnspresence/shared';
import { ApplianceClient, normalizeBaseUrl } from './client.js';
import { SessionManager } from './session.js';
import type { ConnectionTestResult } from './types.js';

export interface ApplianceServices {
  sessions: SessionManager;
  client: ApplianceClient;
}

/**
 * Create the session manager and client for one appliance
 */
export function createApplianceServices(
  config: Pick<TrackerConfig, 'host' | 'password' | 'requestTimeoutMs' | 'recentQueryLimit'>
): ApplianceServices {
  const baseUrl = normalizeBaseUrl(config.host);
  return {
    sessions: new SessionManager({
      baseUrl,
      password: config.password,
      timeoutMs: config.requestTimeoutMs,
    }),
    client: new ApplianceClient({
      baseUrl,
      timeoutMs: config.requestTimeoutMs,
      recentQueryLimit: config.recentQueryLimit,
    }),
  };
}

/**
 * Test the connection once at startup and log the outcome.
 * The session stays open for the first poll; polling starts whatever the result.
 */
export async function checkApplianceConnection({
  sessions,
  client,
}: ApplianceServices): Promise<ConnectionTestResult> {
  const result = await client.testConnection(sessions);
  switch (result) {
    case 'ok':
      console.log('[Appliance] Connected');
      break;
    case 'invalid_auth':
      console.error('[Appliance] Password rejected; polling will pause until resumed');
      break;
    case 'cannot_connect':
      console.warn('[Appliance] Appliance is unreachable; polling will retry with backoff');
      break;
    case 'unknown':
      console.warn('[Appliance] Connection check inconclusive; polling anyway');
      break;
  }
  return result;
}

// ============================================================================
// Re-exports
// ============================================================================

export type {
  ApplianceSession,
  ConnectionTestResult,
  DeviceSource,
  DhcpLease,
  QuerySummaryEntry,
  RawDeviceRecord,
} from './types.js';
export type { SessionProvider, SessionManagerOptions } from './session.js';
export type { ApplianceClientOptions } from './client.js';

export { ApplianceClient, classifyRequestError, normalizeBaseUrl } from './client.js';
export { SessionManager } from './session.js';
