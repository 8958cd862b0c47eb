/**
 * MAC Vendor Lookup
 *
 * Resolves the manufacturer of a MAC address from the bundled OUI table
 * (data/oui.json, keyed by the upper-case first three octets).
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const OUI_TABLE_PATH = fileURLToPath(new URL('../../data/oui.json', import.meta.url));

const OuiTableSchema = z.record(z.string().regex(/^[0-9A-F]{6}$/), z.string().min(1));

export type OuiTable = z.infer<typeof OuiTableSchema>;

let cachedTable: Map<string, string> | null = null;

/**
 * Load and validate an OUI table file
 */
export function loadOuiTable(path = OUI_TABLE_PATH): Map<string, string> {
  const parsed = OuiTableSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
  return new Map(Object.entries(parsed));
}

function defaultTable(): Map<string, string> {
  if (!cachedTable) {
    cachedTable = loadOuiTable();
    console.log(`[Vendor] Loaded ${cachedTable.size} OUI prefixes`);
  }
  return cachedTable;
}

/**
 * Locally administered addresses (randomized / private Wi-Fi MACs) carry no vendor
 */
export function isLocallyAdministered(mac: string): boolean {
  const firstOctet = Number.parseInt(mac.slice(0, 2), 16);
  return Number.isFinite(firstOctet) && (firstOctet & 0x02) === 0x02;
}

/**
 * Look up the vendor for a colon-separated MAC
 *
 * @example
 * lookupVendor('b8:27:eb:12:34:56') // "Raspberry Pi Foundation"
 * lookupVendor('da:a1:19:00:00:01') // null (locally administered)
 */
export function lookupVendor(mac: string, table: Map<string, string> = defaultTable()): string | null {
  if (isLocallyAdministered(mac)) return null;
  const prefix = mac.replace(/[^0-9a-f]/gi, '').slice(0, 6).toUpperCase();
  if (prefix.length < 6) return null;
  return table.get(prefix) ?? null;
}
