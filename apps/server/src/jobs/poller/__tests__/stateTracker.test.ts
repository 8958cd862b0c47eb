/**
 * State Tracker Tests
 *
 * Tests presence functions from poller/stateTracker.ts:
 * - secondsSince: whole seconds since a timestamp
 * - isFreshActivity: whether a polled record counts as present
 * - resolveAbsentPresence: away after the silence threshold
 * - detectTransition: new / arrived / departed
 * - pruneStaleAddresses: drop addresses not reported for a cycle
 */

import { describe, it, expect } from 'vitest';
import {
  detectTransition,
  isFreshActivity,
  pruneStaleAddresses,
  resolveAbsentPresence,
  secondsSince,
} from '../stateTracker.js';

const now = new Date('2024-06-01T12:00:00Z');
const ago = (seconds: number) => new Date(now.getTime() - seconds * 1000);

describe('secondsSince', () => {
  it('should floor to whole seconds', () => {
    expect(secondsSince(new Date(now.getTime() - 90900), now)).toBe(90);
  });

  it('should clamp future timestamps to zero', () => {
    expect(secondsSince(new Date(now.getTime() + 5000), now)).toBe(0);
  });

  it('should return null for unknown times', () => {
    expect(secondsSince(null, now)).toBeNull();
  });
});

describe('isFreshActivity', () => {
  it('should be fresh up to and including the threshold', () => {
    expect(isFreshActivity(ago(900), now, 900)).toBe(true);
    expect(isFreshActivity(ago(901), now, 900)).toBe(false);
  });

  it('should treat unknown activity as fresh', () => {
    expect(isFreshActivity(null, now, 900)).toBe(true);
  });
});

describe('resolveAbsentPresence', () => {
  it('should stay home at exactly the threshold', () => {
    const state = { presence: 'home' as const, lastQuery: ago(900), lastSeen: ago(900) };

    expect(resolveAbsentPresence(state, now, 900)).toBe('home');
  });

  it('should go away once the silence exceeds the threshold', () => {
    const state = { presence: 'home' as const, lastQuery: ago(901), lastSeen: ago(10) };

    expect(resolveAbsentPresence(state, now, 900)).toBe('away');
  });

  it('should fall back to lastSeen without a query time', () => {
    expect(
      resolveAbsentPresence({ presence: 'home', lastQuery: null, lastSeen: ago(1000) }, now, 900)
    ).toBe('away');
    expect(
      resolveAbsentPresence({ presence: 'home', lastQuery: null, lastSeen: ago(100) }, now, 900)
    ).toBe('home');
  });

  it('should leave an away device away', () => {
    expect(
      resolveAbsentPresence({ presence: 'away', lastQuery: ago(10), lastSeen: ago(10) }, now, 900)
    ).toBe('away');
  });
});

describe('detectTransition', () => {
  it('should report new devices', () => {
    expect(detectTransition(undefined, 'home')).toBe('new');
    expect(detectTransition(undefined, 'away')).toBe('new');
  });

  it('should report arrivals and departures', () => {
    expect(detectTransition('away', 'home')).toBe('arrived');
    expect(detectTransition('home', 'away')).toBe('departed');
  });

  it('should report no transition when presence is unchanged', () => {
    expect(detectTransition('home', 'home')).toBeNull();
    expect(detectTransition('away', 'away')).toBeNull();
  });
});

describe('pruneStaleAddresses', () => {
  it('should drop addresses last reported before the previous merge', () => {
    const ips = new Map([
      ['192.168.1.20', ago(60)],
      ['192.168.1.21', ago(30)],
      ['192.168.1.22', now],
    ]);

    pruneStaleAddresses(ips, ago(30));

    expect([...ips.keys()]).toEqual(['192.168.1.21', '192.168.1.22']);
  });

  it('should keep everything on the first merge', () => {
    const ips = new Map([['192.168.1.20', ago(3600)]]);

    pruneStaleAddresses(ips, null);

    expect(ips.size).toBe(1);
  });
});
