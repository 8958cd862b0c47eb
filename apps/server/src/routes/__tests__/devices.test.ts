/**
 * Device routes integration tests
 *
 * - GET /devices - Latest snapshot of every device
 * - GET /devices/:key - A single device
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import sensible from '@fastify/sensible';
import type { SinkRecord } from '@dnspresence/shared';
import { DeviceStore } from '../../services/presenceSink.js';
import { registerErrorHandler } from '../../utils/errors.js';
import { deviceRoutes } from '../devices.js';

async function buildTestApp(store: DeviceStore): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  await app.register(sensible);
  registerErrorHandler(app);
  await app.register(deviceRoutes, { prefix: '/devices', store });

  return app;
}

function createRecord(overrides: Partial<SinkRecord> = {}): SinkRecord {
  return {
    key: 'iphone_eeff',
    presence: 'home',
    transitioned: false,
    attributes: {
      last_query: '2024-06-01T11:59:00.000Z',
      last_query_seconds_ago: 60,
      first_seen: '2024-06-01T11:00:00.000Z',
      num_queries: 42,
      mac_vendor: 'Apple, Inc.',
      ips: ['192.168.1.20'],
      name: 'iphone',
      dhcp_expires: null,
      interface: 'wlan0',
    },
    ...overrides,
  };
}

describe('Device routes', () => {
  let app: FastifyInstance;
  let store: DeviceStore;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    store = new DeviceStore();
    store.publish([createRecord(), createRecord({ key: 'nas_192_168_1_30', presence: 'away' })]);
    app = await buildTestApp(store);
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /devices', () => {
    it('should list every device', async () => {
      const res = await app.inject({ method: 'GET', url: '/devices' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.map((d: SinkRecord) => d.key)).toEqual([
        'iphone_eeff',
        'nas_192_168_1_30',
      ]);
    });

    it('should return an empty list before the first poll', async () => {
      await app.close();
      app = await buildTestApp(new DeviceStore());

      const res = await app.inject({ method: 'GET', url: '/devices' });

      expect(res.json()).toEqual({ data: [] });
    });
  });

  describe('GET /devices/:key', () => {
    it('should return a single device', async () => {
      const res = await app.inject({ method: 'GET', url: '/devices/iphone_eeff' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(createRecord());
    });

    it('should return 404 for an unknown device', async () => {
      const res = await app.inject({ method: 'GET', url: '/devices/ghost_0000' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        statusCode: 404,
        error: 'NotFoundError',
        message: "Device with ID 'ghost_0000' not found",
        code: 'RES_001',
      });
    });
  });

  it('should return 404 for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/unknown' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      statusCode: 404,
      error: 'NotFound',
      message: 'Route GET /unknown not found',
    });
  });
});
