/**
 * Maps merge results onto the records published to the presence sink
 */

import type { DeviceAttributes, SinkRecord } from '@dnspresence/shared';
import type { DeviceState, PresenceUpdate } from './types.js';

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function toDeviceAttributes(state: Readonly<DeviceState>): DeviceAttributes {
  return {
    last_query: toIso(state.lastQuery),
    last_query_seconds_ago: state.lastQuerySecondsAgo,
    first_seen: state.firstSeen.toISOString(),
    num_queries: state.numQueries,
    mac_vendor: state.macVendor,
    ips: [...state.ips.keys()].sort(),
    name: state.name,
    dhcp_expires: toIso(state.dhcpExpires),
    interface: state.interface,
  };
}

/**
 * @example
 * toSinkRecord({ key: 'iphone_eeff', state, transition: 'arrived' })
 * // { key: 'iphone_eeff', presence: 'home', transitioned: true, attributes: { ... } }
 */
export function toSinkRecord(update: PresenceUpdate): SinkRecord {
  return {
    key: update.key,
    presence: update.state.presence,
    transitioned: update.transition !== null,
    attributes: toDeviceAttributes(update.state),
  };
}
