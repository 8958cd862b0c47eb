/**
 * Device Reconciler
 *
 * Owns the DeviceKey -> DeviceState table and merges each poll's raw records
 * into it. Merges are all-or-nothing: work happens on staged copies that are
 * committed only once the whole batch merged.
 */

import type { DeviceKey } from '@dnspresence/shared';
import type { RawDeviceRecord } from '../../services/appliance/types.js';
import { maxDate, maxNullable } from '../../utils/parsing.js';
import { computeDeviceKey } from './deviceKey.js';
import {
  detectTransition,
  isFreshActivity,
  pruneStaleAddresses,
  resolveAbsentPresence,
  secondsSince,
} from './stateTracker.js';
import type { DeviceMerger, DeviceState, PresenceUpdate, ReconcilerConfig } from './types.js';

export function cloneState(state: DeviceState): DeviceState {
  return { ...state, ips: new Map(state.ips) };
}

interface StagedTable {
  states: Map<DeviceKey, DeviceState>;
  macIndex: Map<string, DeviceKey>;
  /** Identifying address -> key, for devices without a MAC */
  ipIndex: Map<string, DeviceKey>;
}

/**
 * @example
 * const reconciler = new DeviceReconciler({ awayThresholdSeconds: 900 });
 * const updates = reconciler.merge(records, new Date());
 */
export class DeviceReconciler implements DeviceMerger {
  private states = new Map<DeviceKey, DeviceState>();
  private macIndex = new Map<string, DeviceKey>();
  private ipIndex = new Map<string, DeviceKey>();
  private lastMergeAt: Date | null = null;

  constructor(private readonly config: ReconcilerConfig) {}

  get size(): number {
    return this.states.size;
  }

  /**
   * Copy of a committed device state
   */
  get(key: DeviceKey): DeviceState | undefined {
    const state = this.states.get(key);
    return state ? cloneState(state) : undefined;
  }

  /**
   * Copies of all committed states in first-seen order
   */
  list(): DeviceState[] {
    return [...this.states.values()].map(cloneState);
  }

  /**
   * Merge one poll's records and return an update for every known device
   */
  merge(records: RawDeviceRecord[], now: Date): PresenceUpdate[] {
    const staged: StagedTable = {
      states: new Map([...this.states].map(([key, state]) => [key, cloneState(state)])),
      macIndex: new Map(this.macIndex),
      ipIndex: new Map(this.ipIndex),
    };
    const reported = new Set<DeviceKey>();
    const fresh = new Set<DeviceKey>();

    for (const record of records) {
      const key = this.resolveKey(record, staged);
      const existing = staged.states.get(key);
      const state = existing
        ? this.applyRecord(existing, record, now)
        : this.createState(key, record, now);

      staged.states.set(key, state);
      const address = record.ips[0];
      if (record.mac) {
        staged.macIndex.set(record.mac, key);
      } else if (address !== undefined) {
        staged.ipIndex.set(address, key);
      }

      reported.add(key);
      if (isFreshActivity(record.lastQuery, now, this.config.awayThresholdSeconds)) {
        fresh.add(key);
      }
    }

    for (const state of staged.states.values()) {
      state.presence = fresh.has(state.key)
        ? 'home'
        : resolveAbsentPresence(state, now, this.config.awayThresholdSeconds);
      if (reported.has(state.key)) {
        pruneStaleAddresses(state.ips, this.lastMergeAt);
      }
      state.lastQuerySecondsAgo = secondsSince(state.lastQuery, now);
    }

    const updates: PresenceUpdate[] = [];
    for (const state of staged.states.values()) {
      updates.push({
        key: state.key,
        state: cloneState(state),
        transition: detectTransition(this.states.get(state.key)?.presence, state.presence),
      });
    }

    this.states = staged.states;
    this.macIndex = staged.macIndex;
    this.ipIndex = staged.ipIndex;
    this.lastMergeAt = now;

    return updates;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Index first (MAC, or identifying address for MAC-less devices), then the
   * computed key. A computed key already owned by a device with another MAC
   * gets the full MAC suffix, or the tagged address form without a MAC.
   */
  private resolveKey(record: RawDeviceRecord, staged: StagedTable): DeviceKey {
    const address = record.ips[0];
    const indexed = record.mac
      ? staged.macIndex.get(record.mac)
      : address !== undefined
        ? staged.ipIndex.get(address)
        : undefined;
    if (indexed !== undefined) return indexed;

    const key = computeDeviceKey(record);
    const owner = staged.states.get(key);
    if (owner && owner.mac !== record.mac) {
      return record.mac
        ? computeDeviceKey(record, { fullMac: true })
        : computeDeviceKey(record, { taggedAddress: true });
    }
    return key;
  }

  private createState(key: DeviceKey, record: RawDeviceRecord, now: Date): DeviceState {
    return {
      key,
      mac: record.mac,
      presence: 'home',
      name: record.name,
      ips: new Map(record.ips.map((ip) => [ip, now])),
      firstSeen: now,
      lastSeen: record.lastQuery ?? now,
      lastQuery: record.lastQuery,
      lastQuerySecondsAgo: null,
      numQueries: record.numQueries,
      macVendor: this.resolveVendor(record),
      dhcpExpires: record.dhcpExpires,
      interface: record.interface,
    };
  }

  private applyRecord(state: DeviceState, record: RawDeviceRecord, now: Date): DeviceState {
    for (const ip of record.ips) {
      state.ips.set(ip, now);
    }
    if (record.name !== null) state.name = record.name;
    state.numQueries = maxNullable(state.numQueries, record.numQueries);
    state.lastQuery = maxDate(state.lastQuery, record.lastQuery);
    state.lastSeen = maxDate(state.lastSeen, record.lastQuery ?? now) ?? state.lastSeen;
    if (state.macVendor === null && record.macVendor !== null) {
      state.macVendor = record.macVendor;
    }
    if (record.dhcpExpires !== null) state.dhcpExpires = record.dhcpExpires;
    if (record.interface !== null) state.interface = record.interface;
    return state;
  }

  private resolveVendor(record: RawDeviceRecord): string | null {
    if (record.macVendor !== null) return record.macVendor;
    if (record.mac === null || !this.config.lookupVendor) return null;
    return this.config.lookupVendor(record.mac);
  }
}
