/**
 * Device Reconciler Tests
 *
 * - Key stability across IP and name changes, with and without a MAC
 * - Away after the silence threshold, home again on fresh activity
 * - Idempotent merges and monotonic counters
 * - All-or-nothing batches
 * - Key collisions, address pruning, vendor resolution
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RawDeviceRecord } from '../../../services/appliance/types.js';
import { DeviceReconciler } from '../reconciler.js';

const T0 = new Date('2024-06-01T12:00:00Z');
const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

function rawRecord(overrides: Partial<RawDeviceRecord> = {}): RawDeviceRecord {
  return {
    mac: 'aa:bb:cc:dd:ee:ff',
    ips: ['192.168.1.20'],
    name: 'iphone',
    dhcpExpires: null,
    interface: 'wlan0',
    lastQuery: null,
    numQueries: null,
    macVendor: null,
    ...overrides,
  };
}

describe('DeviceReconciler', () => {
  let reconciler: DeviceReconciler;

  beforeEach(() => {
    reconciler = new DeviceReconciler({ awayThresholdSeconds: 900 });
  });

  describe('new devices', () => {
    it('should create a home device keyed by name and MAC suffix', () => {
      const updates = reconciler.merge([rawRecord({ lastQuery: T0, numQueries: 10 })], T0);

      expect(updates).toHaveLength(1);
      expect(updates[0]?.key).toBe('iphone_eeff');
      expect(updates[0]?.transition).toBe('new');
      expect(updates[0]?.state).toMatchObject({
        presence: 'home',
        name: 'iphone',
        firstSeen: T0,
        lastSeen: T0,
        lastQuery: T0,
        lastQuerySecondsAgo: 0,
        numQueries: 10,
      });
    });

    it('should create a stale device as away', () => {
      const [update] = reconciler.merge([rawRecord({ lastQuery: at(-2000) })], T0);

      expect(update?.transition).toBe('new');
      expect(update?.state.presence).toBe('away');
    });

    it('should treat a device without query time as home', () => {
      const [update] = reconciler.merge([rawRecord()], T0);

      expect(update?.state.presence).toBe('home');
      expect(update?.state.lastSeen).toEqual(T0);
      expect(update?.state.lastQuerySecondsAgo).toBeNull();
    });

    it('should key MAC-less devices by IP', () => {
      const [update] = reconciler.merge(
        [rawRecord({ mac: null, name: null, ips: ['192.168.1.30'] })],
        T0
      );

      expect(update?.key).toBe('device_192_168_1_30');
    });
  });

  describe('key stability', () => {
    it('should keep the key when the IP and name change', () => {
      reconciler.merge([rawRecord({ lastQuery: T0 })], T0);

      const updates = reconciler.merge(
        [rawRecord({ ips: ['192.168.1.99'], name: 'Johns-Phone', lastQuery: at(30) })],
        at(30)
      );

      expect(updates.map((u) => u.key)).toEqual(['iphone_eeff']);
      expect(reconciler.size).toBe(1);
      expect(reconciler.get('iphone_eeff')?.name).toBe('Johns-Phone');
    });

    it('should give same-named devices distinct keys', () => {
      const updates = reconciler.merge(
        [rawRecord(), rawRecord({ mac: 'aa:bb:cc:dd:12:34' })],
        T0
      );

      expect(updates.map((u) => u.key)).toEqual(['iphone_eeff', 'iphone_1234']);
    });

    it('should fall back to the full MAC when the short key is taken', () => {
      const other = rawRecord({ mac: '11:22:33:44:ee:ff' });

      const first = reconciler.merge([rawRecord(), other], T0);
      const second = reconciler.merge([other], at(30));

      expect(first.map((u) => u.key)).toEqual(['iphone_eeff', 'iphone_11223344eeff']);
      expect(second.map((u) => u.key)).toEqual(['iphone_eeff', 'iphone_11223344eeff']);
      expect(reconciler.get('iphone_11223344eeff')?.mac).toBe('11:22:33:44:ee:ff');
    });

    it('should keep the key of a MAC-less device when its name disappears', () => {
      const named = rawRecord({ mac: null, name: 'iphone', ips: ['192.168.1.50'] });
      reconciler.merge([named], T0);

      const updates = reconciler.merge([{ ...named, name: null }], at(30));

      expect(updates.map((u) => u.key)).toEqual(['iphone_192_168_1_50']);
      expect(updates[0]?.transition).toBeNull();
      expect(reconciler.get('iphone_192_168_1_50')?.name).toBe('iphone');
    });

    it('should keep the key of a MAC-less device when it is renamed', () => {
      reconciler.merge([rawRecord({ mac: null, name: 'nas', ips: ['192.168.1.30'] })], T0);

      const updates = reconciler.merge(
        [rawRecord({ mac: null, name: 'storage', ips: ['192.168.1.30'] })],
        at(30)
      );

      expect(updates.map((u) => u.key)).toEqual(['nas_192_168_1_30']);
      expect(reconciler.get('nas_192_168_1_30')?.name).toBe('storage');
    });

    it('should give a MAC-less device a new key when its address changes', () => {
      reconciler.merge([rawRecord({ mac: null, name: 'nas', ips: ['192.168.1.30'] })], T0);

      const updates = reconciler.merge(
        [rawRecord({ mac: null, name: 'nas', ips: ['192.168.1.31'] })],
        at(30)
      );

      expect(updates.map((u) => [u.key, u.transition])).toEqual([
        ['nas_192_168_1_30', null],
        ['nas_192_168_1_31', 'new'],
      ]);
    });

    it('should not merge an address key into a matching MAC key', () => {
      const withMac = rawRecord({ mac: 'aa:bb:cc:dd:12:34', name: null, ips: ['192.168.1.9'] });
      const withoutMac = rawRecord({ mac: null, name: null, ips: ['::1234'] });

      const first = reconciler.merge([withMac, withoutMac], T0);
      const second = reconciler.merge([withMac, withoutMac], at(30));

      expect(first.map((u) => u.key)).toEqual(['device_1234', 'device_ip_1234']);
      expect(second.map((u) => u.key)).toEqual(['device_1234', 'device_ip_1234']);
      expect(reconciler.size).toBe(2);
      expect([...(reconciler.get('device_1234')?.ips.keys() ?? [])]).toEqual(['192.168.1.9']);
      expect(reconciler.get('device_ip_1234')?.mac).toBeNull();
    });

    it('should give a MAC device the full MAC when an address key holds its short key', () => {
      const withoutMac = rawRecord({ mac: null, name: null, ips: ['::1234'] });
      const withMac = rawRecord({ mac: 'aa:bb:cc:dd:12:34', name: null, ips: ['192.168.1.9'] });

      const updates = reconciler.merge([withoutMac, withMac], T0);

      expect(updates.map((u) => u.key)).toEqual(['device_1234', 'device_aabbccdd1234']);
    });
  });

  describe('presence', () => {
    it('should stay home at exactly the threshold and go away one second later', () => {
      const record = rawRecord({ lastQuery: T0 });
      reconciler.merge([record], T0);

      const atThreshold = reconciler.merge([record], at(900));
      const pastThreshold = reconciler.merge([record], at(901));

      expect(atThreshold[0]?.state.presence).toBe('home');
      expect(atThreshold[0]?.transition).toBeNull();
      expect(pastThreshold[0]?.state.presence).toBe('away');
      expect(pastThreshold[0]?.transition).toBe('departed');
    });

    it('should apply the threshold to devices missing from the poll', () => {
      reconciler.merge([rawRecord({ lastQuery: T0 })], T0);

      expect(reconciler.merge([], at(900))[0]?.state.presence).toBe('home');
      expect(reconciler.merge([], at(901))[0]?.state.presence).toBe('away');
    });

    it('should use lastSeen for absent devices without a query time', () => {
      reconciler.merge([rawRecord()], T0);

      const [update] = reconciler.merge([], at(901));

      expect(update?.state.presence).toBe('away');
    });

    it('should report an arrival on fresh activity', () => {
      reconciler.merge([rawRecord({ lastQuery: T0 })], T0);
      reconciler.merge([], at(1000));

      const [update] = reconciler.merge([rawRecord({ lastQuery: at(1100) })], at(1100));

      expect(update?.state.presence).toBe('home');
      expect(update?.transition).toBe('arrived');
    });

    it('should recompute seconds since the last query on every merge', () => {
      reconciler.merge([rawRecord({ lastQuery: at(-120) })], T0);

      const [update] = reconciler.merge([], at(30));

      expect(update?.state.lastQuerySecondsAgo).toBe(150);
    });
  });

  describe('merge semantics', () => {
    it('should be idempotent for the same batch at the same time', () => {
      const batch = [
        rawRecord({ lastQuery: at(-60), numQueries: 12 }),
        rawRecord({ mac: null, name: 'nas', ips: ['192.168.1.30'], lastQuery: at(-30) }),
      ];

      const first = reconciler.merge(batch, T0);
      const second = reconciler.merge(batch, T0);

      expect(second.map((u) => u.state)).toEqual(first.map((u) => u.state));
      expect(first.map((u) => u.transition)).toEqual(['new', 'new']);
      expect(second.map((u) => u.transition)).toEqual([null, null]);
    });

    it('should never decrease numQueries or move firstSeen', () => {
      reconciler.merge([rawRecord({ numQueries: 50, lastQuery: T0 })], T0);
      reconciler.merge([rawRecord({ numQueries: 20, lastQuery: at(-100) })], at(30));
      const [update] = reconciler.merge([rawRecord({ numQueries: null })], at(60));

      expect(update?.state.numQueries).toBe(50);
      expect(update?.state.firstSeen).toEqual(T0);
      expect(update?.state.lastQuery).toEqual(T0);
    });

    it('should keep the last known name when a poll reports none', () => {
      reconciler.merge([rawRecord({ name: 'iphone' })], T0);

      reconciler.merge([rawRecord({ name: null })], at(30));

      expect(reconciler.get('iphone_eeff')?.name).toBe('iphone');
    });

    it('should replace lease and interface data only when reported', () => {
      const expires = at(3600);
      reconciler.merge([rawRecord({ dhcpExpires: expires })], T0);

      reconciler.merge([rawRecord({ dhcpExpires: null, interface: null })], at(30));

      expect(reconciler.get('iphone_eeff')).toMatchObject({
        dhcpExpires: expires,
        interface: 'wlan0',
      });
    });

    it('should leave the table untouched when a batch fails', () => {
      reconciler.merge([rawRecord({ numQueries: 10 })], T0);
      const batch = [
        rawRecord({ numQueries: 99 }),
        rawRecord({ mac: '11:22:33:44:55:66' }),
        rawRecord({ mac: null, ips: [] }),
      ];

      expect(() => reconciler.merge(batch, at(30))).toThrow(
        'Cannot key a device record with neither MAC nor IP'
      );

      expect(reconciler.size).toBe(1);
      expect(reconciler.get('iphone_eeff')?.numQueries).toBe(10);
    });

    it('should not expose committed state through updates', () => {
      const [update] = reconciler.merge([rawRecord()], T0);
      update?.state.ips.clear();

      expect(reconciler.get('iphone_eeff')?.ips.size).toBe(1);
    });
  });

  describe('addresses', () => {
    it('should drop an address not reported for a full cycle', () => {
      reconciler.merge([rawRecord({ ips: ['192.168.1.20'] })], T0);

      reconciler.merge([rawRecord({ ips: ['192.168.1.21'] })], at(30));
      expect([...(reconciler.get('iphone_eeff')?.ips.keys() ?? [])]).toEqual([
        '192.168.1.20',
        '192.168.1.21',
      ]);

      reconciler.merge([rawRecord({ ips: ['192.168.1.21'] })], at(60));
      expect([...(reconciler.get('iphone_eeff')?.ips.keys() ?? [])]).toEqual(['192.168.1.21']);
    });

    it('should keep the addresses of devices missing from the poll', () => {
      reconciler.merge([rawRecord()], T0);

      reconciler.merge([], at(30));
      reconciler.merge([], at(60));

      expect(reconciler.get('iphone_eeff')?.ips.has('192.168.1.20')).toBe(true);
    });
  });

  describe('vendor resolution', () => {
    it('should look up the vendor once when the device is first seen', () => {
      const lookupVendor = vi.fn(() => 'Raspberry Pi Foundation');
      reconciler = new DeviceReconciler({ awayThresholdSeconds: 900, lookupVendor });

      reconciler.merge([rawRecord({ mac: 'b8:27:eb:12:34:56' })], T0);
      reconciler.merge([rawRecord({ mac: 'b8:27:eb:12:34:56' })], at(30));

      expect(lookupVendor).toHaveBeenCalledTimes(1);
      expect(lookupVendor).toHaveBeenCalledWith('b8:27:eb:12:34:56');
      expect(reconciler.get('iphone_3456')?.macVendor).toBe('Raspberry Pi Foundation');
    });

    it('should prefer the vendor the appliance resolved', () => {
      const lookupVendor = vi.fn(() => 'Raspberry Pi Foundation');
      reconciler = new DeviceReconciler({ awayThresholdSeconds: 900, lookupVendor });

      reconciler.merge([rawRecord({ macVendor: 'Apple, Inc.' })], T0);

      expect(lookupVendor).not.toHaveBeenCalled();
      expect(reconciler.get('iphone_eeff')?.macVendor).toBe('Apple, Inc.');
    });

    it('should adopt a later appliance vendor while none is known', () => {
      reconciler.merge([rawRecord()], T0);

      reconciler.merge([rawRecord({ macVendor: 'Apple, Inc.' })], at(30));
      reconciler.merge([rawRecord({ macVendor: 'Other Vendor' })], at(60));

      expect(reconciler.get('iphone_eeff')?.macVendor).toBe('Apple, Inc.');
    });

    it('should not look up MAC-less devices', () => {
      const lookupVendor = vi.fn(() => 'Raspberry Pi Foundation');
      reconciler = new DeviceReconciler({ awayThresholdSeconds: 900, lookupVendor });

      reconciler.merge([rawRecord({ mac: null })], T0);

      expect(lookupVendor).not.toHaveBeenCalled();
    });
  });

  describe('list', () => {
    it('should return devices in first-seen order', () => {
      reconciler.merge([rawRecord()], T0);
      reconciler.merge([rawRecord({ mac: 'aa:bb:cc:dd:12:34', name: 'laptop' })], at(30));

      expect(reconciler.list().map((s) => s.key)).toEqual(['iphone_eeff', 'laptop_1234']);
    });
  });
});
