/**
 * Device Key Construction
 *
 * A device key is `<label>_<suffix>`: the slugified name (or "device") and
 * either the last four hex digits of the MAC or the slugified IP. Address keys
 * that clash with a MAC key take the form `<label>_ip_<address>`.
 */

import { DEVICE_KEY, type DeviceKey } from '@dnspresence/shared';
import type { RawDeviceRecord } from '../../services/appliance/types.js';

/**
 * Lower-case ASCII slug with underscores
 *
 * @example
 * slugify("Anna's iPhone")  // "anna_s_iphone"
 * slugify('Küche-Lautsprecher') // "kuche_lautsprecher"
 * slugify('192.168.1.20')   // "192_168_1_20"
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, DEVICE_KEY.SEPARATOR)
    .replace(/^_+|_+$/g, '');
}

/**
 * Bare lower-case hex digits of a MAC
 */
export function macHex(mac: string): string {
  return mac.replace(/[^0-9a-f]/gi, '').toLowerCase();
}

export function keyLabel(name: string | null): string {
  const slug = name ? slugify(name) : '';
  return slug || DEVICE_KEY.FALLBACK_LABEL;
}

/**
 * Compute the key for a device record.
 * With fullMac the whole MAC is used as suffix, for devices whose short key is taken;
 * taggedAddress does the same for MAC-less devices.
 *
 * @example
 * computeDeviceKey({ name: 'iPhone', mac: 'aa:bb:cc:dd:ee:ff', ips: [] }) // "iphone_eeff"
 * computeDeviceKey({ name: null, mac: null, ips: ['192.168.1.5'] })      // "device_192_168_1_5"
 */
export function computeDeviceKey(
  record: Pick<RawDeviceRecord, 'mac' | 'ips' | 'name'>,
  options: { fullMac?: boolean; taggedAddress?: boolean } = {}
): DeviceKey {
  const label = keyLabel(record.name);

  if (record.mac) {
    const hex = macHex(record.mac);
    const suffix = options.fullMac ? hex : hex.slice(-DEVICE_KEY.MAC_SUFFIX_LENGTH);
    return `${label}${DEVICE_KEY.SEPARATOR}${suffix}`;
  }

  const ip = record.ips[0];
  const ipSlug = ip ? slugify(ip) : '';
  if (!ipSlug) {
    throw new Error('Cannot key a device record with neither MAC nor IP');
  }
  const sep = DEVICE_KEY.SEPARATOR;
  return options.taggedAddress
    ? `${label}${sep}${DEVICE_KEY.ADDRESS_TAG}${sep}${ipSlug}`
    : `${label}${sep}${ipSlug}`;
}
