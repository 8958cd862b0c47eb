/**
 * Presence Sink
 *
 * Contract between the poller and whatever consumes presence data, plus the
 * in-memory store backing the HTTP API.
 */

import type { ApplianceAvailability, DeviceKey, SinkRecord } from '@dnspresence/shared';

export interface PresenceSink {
  /** Receive the full device table after a successful poll */
  publish(records: SinkRecord[]): void | Promise<void>;
  /** Appliance reachability; presence stays frozen while unavailable */
  setAvailability(available: boolean, reason?: string | null): void | Promise<void>;
}

/**
 * Latest published snapshot, keyed by device
 *
 * @example
 * const store = new DeviceStore();
 * store.publish(records);
 * store.get('iphone_eeff')?.presence; // 'home'
 */
export class DeviceStore implements PresenceSink {
  private records = new Map<DeviceKey, SinkRecord>();
  private availability: ApplianceAvailability;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.availability = {
      available: false,
      reason: 'No poll completed yet',
      since: now().toISOString(),
    };
  }

  publish(records: SinkRecord[]): void {
    for (const record of records) {
      const previous = this.records.get(record.key);
      if (record.transitioned) {
        console.log(
          `[Presence] ${record.key}: ${previous?.presence ?? 'unknown'} -> ${record.presence}`
        );
      }
      this.records.set(record.key, record);
    }
  }

  setAvailability(available: boolean, reason: string | null = null): void {
    const changed = this.availability.available !== available;
    if (!changed && this.availability.reason === reason) return;

    this.availability = {
      available,
      reason,
      since: changed ? this.now().toISOString() : this.availability.since,
    };
    if (changed) {
      console.log(
        available
          ? '[Presence] Appliance is available'
          : `[Presence] Appliance is unavailable: ${reason ?? 'unknown reason'}`
      );
    }
  }

  list(): SinkRecord[] {
    return [...this.records.values()];
  }

  get(key: DeviceKey): SinkRecord | undefined {
    return this.records.get(key);
  }

  getAvailability(): ApplianceAvailability {
    return { ...this.availability };
  }
}
