/**
 * Appliance Client
 *
 * Reads the network table, recent query log and DHCP leases from a Pi-hole v6
 * appliance and joins them into RawDeviceRecords. All failures are mapped onto
 * the appliance error kinds so the scheduler can react to them.
 */

import { APPLIANCE_API, APPLIANCE_LIMITS } from '@dnspresence/shared';
import {
  AppError,
  MalformedResponseError,
  SessionExpiredError,
  AuthenticationError,
  UnreachableError,
} from '../../utils/errors.js';
import { applianceHeaders, fetchJson, HttpClientError, isNetworkError } from '../../utils/http.js';
import {
  joinDeviceRecords,
  parseDhcpLeasesResponse,
  parseNetworkDevicesResponse,
  parseQuerySummary,
} from './parser.js';
import type { SessionProvider } from './session.js';
import type {
  ApplianceSession,
  ConnectionTestResult,
  DeviceSource,
  RawDeviceRecord,
} from './types.js';

export interface ApplianceClientOptions {
  /** Normalized base URL, see normalizeBaseUrl */
  baseUrl: string;
  timeoutMs?: number;
  recentQueryLimit?: number;
}

/**
 * Turn a configured host into a base URL
 *
 * @example
 * normalizeBaseUrl('pi.hole')                 // "http://pi.hole"
 * normalizeBaseUrl('https://192.168.1.2/')    // "https://192.168.1.2"
 */
export function normalizeBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * Map a request failure onto an appliance error kind
 */
export function classifyRequestError(error: unknown, url: string): Error {
  if (error instanceof AppError) return error;

  if (error instanceof HttpClientError) {
    if (error.statusCode === 401) {
      return new SessionExpiredError();
    }
    if (error.statusCode === 403) {
      return new AuthenticationError('Appliance refused access to the API');
    }
    if (error.statusCode >= 500) {
      return new UnreachableError(`Appliance returned HTTP ${error.statusCode}`, { url });
    }
    return new MalformedResponseError(`Unexpected HTTP ${error.statusCode} from appliance`, {
      url,
    });
  }

  if (isNetworkError(error)) {
    const reason = error instanceof Error ? error.message : String(error);
    return new UnreachableError(`Cannot reach appliance: ${reason}`, { url });
  }

  // response.json() on a non-JSON body
  if (error instanceof SyntaxError) {
    return new MalformedResponseError(`Appliance returned invalid JSON: ${error.message}`, {
      url,
    });
  }

  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Pi-hole v6 device source
 *
 * @example
 * const client = new ApplianceClient({ baseUrl: 'http://pi.hole' });
 * const records = await sessions.withSession((s) => client.fetchDevices(s));
 */
export class ApplianceClient implements DeviceSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly recentQueryLimit: number;

  constructor(options: ApplianceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? APPLIANCE_LIMITS.REQUEST_TIMEOUT_MS;
    this.recentQueryLimit = options.recentQueryLimit ?? APPLIANCE_LIMITS.RECENT_QUERY_LIMIT;
  }

  /**
   * Fetch and join everything the appliance knows about its clients
   */
  async fetchDevices(session: ApplianceSession, signal?: AbortSignal): Promise<RawDeviceRecord[]> {
    const queryParams = new URLSearchParams({ length: String(this.recentQueryLimit) });

    const [devices, queries, leases] = await Promise.all([
      this.get(this.networkDevicesPath(), session, signal),
      this.get(`${APPLIANCE_API.QUERIES}?${queryParams.toString()}`, session, signal),
      this.get(APPLIANCE_API.DHCP_LEASES, session, signal),
    ]);

    return joinDeviceRecords(
      parseNetworkDevicesResponse(devices),
      parseQuerySummary(queries),
      parseDhcpLeasesResponse(leases)
    );
  }

  /**
   * Authenticate and read the network table once, for setup validation
   */
  async testConnection(sessions: SessionProvider): Promise<ConnectionTestResult> {
    try {
      await sessions.withSession(async (session) => {
        const data = await this.get(this.networkDevicesPath(), session);
        return parseNetworkDevicesResponse(data);
      });
      return 'ok';
    } catch (error) {
      if (error instanceof AuthenticationError) return 'invalid_auth';
      if (error instanceof UnreachableError) return 'cannot_connect';
      console.error('[Appliance] Connection test failed:', error);
      return 'unknown';
    }
  }

  private networkDevicesPath(): string {
    const params = new URLSearchParams({
      max_devices: String(APPLIANCE_LIMITS.MAX_DEVICES),
      max_addresses: String(APPLIANCE_LIMITS.MAX_ADDRESSES),
    });
    return `${APPLIANCE_API.NETWORK_DEVICES}?${params.toString()}`;
  }

  private async get(path: string, session: ApplianceSession, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await fetchJson<unknown>(url, {
        headers: applianceHeaders(session.sid),
        service: 'appliance',
        timeout: this.timeoutMs,
        signal,
      });
    } catch (error) {
      throw classifyRequestError(error, url);
    }
  }
}
