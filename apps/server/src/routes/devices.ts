/**
 * Device presence routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { deviceKeyParamSchema } from '@dnspresence/shared';
import type { DeviceStore } from '../services/presenceSink.js';
import { NotFoundError } from '../utils/errors.js';

export interface DeviceRoutesOptions {
  store: DeviceStore;
}

export const deviceRoutes: FastifyPluginAsync<DeviceRoutesOptions> = async (app, { store }) => {
  /**
   * GET /devices - Latest presence snapshot for every known device
   */
  app.get('/', async () => {
    return { data: store.list() };
  });

  /**
   * GET /devices/:key - Presence of a single device
   */
  app.get('/:key', async (request, reply) => {
    const params = deviceKeyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.badRequest('Invalid device key');
    }

    const record = store.get(params.data.key);
    if (!record) {
      throw new NotFoundError('Device', params.data.key);
    }
    return record;
  });
};
