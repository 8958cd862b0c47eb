/**
 * Fastify application
 */

import Fastify, { type FastifyInstance } from 'fastify';
import sensible from '@fastify/sensible';
import { API_BASE_PATH } from '@dnspresence/shared';
import type { DeviceStore } from './services/presenceSink.js';
import { registerErrorHandler } from './utils/errors.js';
import { deviceRoutes } from './routes/devices.js';
import { healthRoutes, type PollControl } from './routes/health.js';

export interface BuildAppOptions {
  store: DeviceStore;
  scheduler: PollControl;
  logLevel?: string;
  /** false disables request logging entirely (tests) */
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: options.logLevel ?? 'info',
            transport:
              process.env.NODE_ENV === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined,
          },
  });

  await app.register(sensible);
  registerErrorHandler(app);

  await app.register(healthRoutes, {
    prefix: API_BASE_PATH,
    store: options.store,
    scheduler: options.scheduler,
  });
  await app.register(deviceRoutes, { prefix: `${API_BASE_PATH}/devices`, store: options.store });

  return app;
}
