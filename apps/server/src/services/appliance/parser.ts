/**
 * Appliance API Response Parser
 *
 * Zod schemas for the Pi-hole v6 endpoints we consume, plus pure functions that
 * normalize and join the network table, recent query log and DHCP leases into
 * RawDeviceRecords. Separated from the client for testability.
 */

import { z } from 'zod';
import { MalformedResponseError } from '../../utils/errors.js';
import {
  epochSecondsToDate,
  maxDate,
  maxNullable,
  parseNullableCount,
  parseNullableString,
} from '../../utils/parsing.js';
import type { DhcpLease, QuerySummaryEntry, RawDeviceRecord } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

// Exported for testing
export const NetworkDeviceSchema = z.object({
  id: z.number().optional(),
  hwaddr: z.string().nullish(),
  interface: z.string().nullish(),
  firstSeen: z.number().nullish(),
  lastQuery: z.number().nullish(),
  numQueries: z.number().nullish(),
  macVendor: z.string().nullish(),
  ips: z
    .array(
      z.object({
        ip: z.string(),
        name: z.string().nullish(),
        lastSeen: z.number().nullish(),
        nameUpdated: z.number().nullish(),
      })
    )
    .default([]),
});

export const NetworkDevicesResponseSchema = z.object({
  devices: z.array(NetworkDeviceSchema),
});

export const QueryLogResponseSchema = z.object({
  queries: z.array(
    z.object({
      // Fractional epoch seconds
      time: z.number(),
      client: z.object({
        ip: z.string(),
        name: z.string().nullish(),
      }),
    })
  ),
});

export const DhcpLeasesResponseSchema = z.object({
  leases: z.array(
    z.object({
      // 0 means an infinite lease
      expires: z.number().nullish(),
      name: z.string().nullish(),
      hwaddr: z.string().nullish(),
      ip: z.string(),
    })
  ),
});

export const AuthResponseSchema = z.object({
  session: z.object({
    valid: z.boolean(),
    totp: z.boolean().optional(),
    sid: z.string().nullish(),
    // Seconds; -1 when no password is set
    validity: z.number().nullish(),
    message: z.string().nullish(),
  }),
});

export type NetworkDevice = z.infer<typeof NetworkDeviceSchema>;
export type AuthResponse = z.infer<typeof AuthResponseSchema>;

/**
 * Validate a payload against a schema, raising MalformedResponseError on mismatch
 */
function validate<S extends z.ZodType>(schema: S, data: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    console.error(`[Appliance] ${label} response validation failed:`, z.treeifyError(parsed.error));
    throw new MalformedResponseError(`Invalid ${label} response: ${parsed.error.message}`, {
      endpoint: label,
    });
  }
  return parsed.data;
}

// ============================================================================
// MAC Helpers
// ============================================================================

const MAC_PATTERN = /^([0-9a-f]{2}:){5}[0-9a-f]{2}$/;
// The network table stores MAC-less clients as "ip-<address>"
const PLACEHOLDER_PATTERN = /^ip-(.+)$/i;

/**
 * Normalize a MAC address to lower-case colon form
 *
 * @example
 * normalizeMac('AA-BB-CC-DD-EE-FF') // "aa:bb:cc:dd:ee:ff"
 * normalizeMac('ip-192.168.1.5')    // null
 * normalizeMac('00:00:00:00:00:00') // null
 */
export function normalizeMac(raw: unknown): string | null {
  const str = parseNullableString(raw);
  if (str === null) return null;
  const mac = str.toLowerCase().replace(/-/g, ':');
  if (!MAC_PATTERN.test(mac) || mac === '00:00:00:00:00:00') return null;
  return mac;
}

/**
 * Extract the address from a MAC-less placeholder hwaddr
 */
export function placeholderAddress(raw: unknown): string | null {
  const str = parseNullableString(raw);
  if (str === null) return null;
  const match = PLACEHOLDER_PATTERN.exec(str);
  return match?.[1] ?? null;
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Parse GET /api/network/devices
 */
export function parseNetworkDevicesResponse(data: unknown): NetworkDevice[] {
  return validate(NetworkDevicesResponseSchema, data, 'network devices').devices;
}

/**
 * Parse GET /api/queries into a per-client summary keyed by IP
 */
export function parseQuerySummary(data: unknown): Map<string, QuerySummaryEntry> {
  const { queries } = validate(QueryLogResponseSchema, data, 'query log');
  const summary = new Map<string, QuerySummaryEntry>();

  for (const query of queries) {
    const ip = parseNullableString(query.client.ip);
    const time = epochSecondsToDate(query.time);
    if (ip === null || time === null) continue;

    const name = parseNullableString(query.client.name);
    const existing = summary.get(ip);
    if (!existing) {
      summary.set(ip, { ip, name, lastQuery: time, count: 1 });
      continue;
    }

    existing.count += 1;
    if (time.getTime() >= existing.lastQuery.getTime()) {
      existing.lastQuery = time;
      existing.name = name ?? existing.name;
    } else if (existing.name === null) {
      existing.name = name;
    }
  }

  return summary;
}

/**
 * Parse GET /api/dhcp/leases
 */
export function parseDhcpLeasesResponse(data: unknown): DhcpLease[] {
  const { leases } = validate(DhcpLeasesResponseSchema, data, 'DHCP leases');
  const result: DhcpLease[] = [];
  for (const lease of leases) {
    const ip = parseNullableString(lease.ip);
    if (ip === null) continue;
    result.push({
      mac: normalizeMac(lease.hwaddr),
      ip,
      name: parseNullableString(lease.name),
      expires: epochSecondsToDate(lease.expires),
    });
  }
  return result;
}

/**
 * Parse POST /api/auth
 */
export function parseAuthResponse(data: unknown): AuthResponse['session'] {
  return validate(AuthResponseSchema, data, 'authentication').session;
}

// ============================================================================
// Joining
// ============================================================================

/**
 * Best name for a network-table device: most recently updated named address
 */
function pickDeviceName(device: NetworkDevice): string | null {
  let best: { name: string; updated: number } | null = null;
  for (const address of device.ips) {
    const name = parseNullableString(address.name);
    if (name === null) continue;
    const updated = address.nameUpdated ?? address.lastSeen ?? 0;
    if (best === null || updated > best.updated) {
      best = { name, updated };
    }
  }
  return best?.name ?? null;
}

/**
 * Join the network table, query summary and DHCP leases by MAC/IP.
 *
 * - One record per network-table device; placeholder hwaddrs become mac: null
 *   with the placeholder address first in ips
 * - Query-log clients not covered by any network device become IP-only records
 *   (MAC taken from a matching DHCP lease when one exists)
 * - lastQuery and numQueries take the larger of table and summary values
 * - Records with neither MAC nor IP are dropped (nothing to identify them by)
 */
export function joinDeviceRecords(
  devices: NetworkDevice[],
  summary: Map<string, QuerySummaryEntry>,
  leases: DhcpLease[]
): RawDeviceRecord[] {
  const leaseByMac = new Map<string, DhcpLease>();
  const leaseByIp = new Map<string, DhcpLease>();
  for (const lease of leases) {
    if (lease.mac) leaseByMac.set(lease.mac, lease);
    leaseByIp.set(lease.ip, lease);
  }

  const records: RawDeviceRecord[] = [];
  const coveredIps = new Set<string>();

  for (const device of devices) {
    const mac = normalizeMac(device.hwaddr);
    const ips: string[] = [];
    const addIp = (ip: string | null) => {
      if (ip !== null && !ips.includes(ip)) ips.push(ip);
    };

    if (mac === null) addIp(placeholderAddress(device.hwaddr));
    for (const address of device.ips) addIp(parseNullableString(address.ip));

    const lease =
      (mac !== null ? leaseByMac.get(mac) : undefined) ??
      ips.map((ip) => leaseByIp.get(ip)).find((l) => l !== undefined);
    if (lease && (mac === null || lease.mac === mac)) addIp(lease.ip);

    if (mac === null && ips.length === 0) continue;

    let lastQuery = epochSecondsToDate(device.lastQuery);
    let numQueries = parseNullableCount(device.numQueries);
    let summaryName: string | null = null;
    for (const ip of ips) {
      coveredIps.add(ip);
      const entry = summary.get(ip);
      if (!entry) continue;
      lastQuery = maxDate(lastQuery, entry.lastQuery);
      numQueries = maxNullable(numQueries, entry.count);
      summaryName = summaryName ?? entry.name;
    }

    records.push({
      mac,
      ips,
      name: pickDeviceName(device) ?? lease?.name ?? summaryName,
      dhcpExpires: lease?.expires ?? null,
      interface: parseNullableString(device.interface),
      lastQuery,
      numQueries,
      macVendor: parseNullableString(device.macVendor),
    });
  }

  for (const entry of summary.values()) {
    if (coveredIps.has(entry.ip)) continue;
    const lease = leaseByIp.get(entry.ip);
    records.push({
      mac: lease?.mac ?? null,
      ips: [entry.ip],
      name: entry.name ?? lease?.name ?? null,
      dhcpExpires: lease?.expires ?? null,
      interface: null,
      lastQuery: entry.lastQuery,
      numQueries: entry.count,
      macVendor: null,
    });
  }

  return records;
}
