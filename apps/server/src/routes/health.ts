/**
 * Health and poll control routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { resumeBodySchema } from '@dnspresence/shared';
import type { PollScheduler } from '../jobs/poller/index.js';
import type { DeviceStore } from '../services/presenceSink.js';

/**
 * Scheduler operations exposed over HTTP
 */
export type PollControl = Pick<PollScheduler, 'getStatus' | 'triggerPoll' | 'resume'>;

export interface HealthRoutesOptions {
  store: DeviceStore;
  scheduler: PollControl;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  app,
  { store, scheduler }
) => {
  /**
   * GET /health - Appliance availability and scheduler status
   */
  app.get('/health', async () => {
    const appliance = store.getAvailability();
    const poller = scheduler.getStatus();
    return {
      status: appliance.available && poller.state !== 'paused' ? 'ok' : 'degraded',
      appliance,
      poller,
      devices: store.list().length,
    };
  });

  /**
   * POST /poll - Trigger an immediate poll
   */
  app.post('/poll', async (_request, reply) => {
    const status = scheduler.getStatus();
    if (status.state === 'paused') {
      return reply.conflict('Polling is paused after repeated authentication failures');
    }
    if (!scheduler.triggerPoll()) {
      return reply.conflict('A poll is already running');
    }
    return reply.status(202).send({ triggered: true, poller: scheduler.getStatus() });
  });

  /**
   * POST /poll/resume - Leave the authentication pause, optionally with a new password
   */
  app.post('/poll/resume', async (request, reply) => {
    const body = resumeBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.badRequest('Invalid request body');
    }

    const resumed = await scheduler.resume(body.data.password);
    if (!resumed) {
      return reply.conflict('Polling is not paused');
    }
    return { resumed: true, poller: scheduler.getStatus() };
  });
};
