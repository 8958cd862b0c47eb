import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { DeviceReconciler, PollScheduler } from './jobs/poller/index.js';
import { checkApplianceConnection, createApplianceServices } from './services/appliance/index.js';
import { lookupVendor } from './services/macVendor.js';
import { DeviceStore } from './services/presenceSink.js';

// Load .env from project root (apps/server/src -> project root)
config({ path: fileURLToPath(new URL('../../../.env', import.meta.url)) });

async function start() {
  try {
    const { tracker, server } = loadConfig();

    const appliance = createApplianceServices(tracker);
    const { sessions, client } = appliance;
    const store = new DeviceStore();
    const reconciler = new DeviceReconciler({
      awayThresholdSeconds: tracker.awayThresholdSeconds,
      lookupVendor: (mac) => lookupVendor(mac),
    });
    const scheduler = new PollScheduler(
      {
        pollIntervalSeconds: tracker.pollIntervalSeconds,
        maxBackoffSeconds: tracker.maxBackoffSeconds,
      },
      { sessions, source: client, reconciler, sink: store }
    );

    const app = await buildApp({ store, scheduler, logLevel: server.logLevel });

    app.addHook('onClose', async () => {
      await scheduler.stop();
    });

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    for (const signal of signals) {
      process.on(signal, () => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        void app.close().then(() => process.exit(0));
      });
    }

    await app.listen({ port: server.port, host: server.host });
    app.log.info(`Server running at http://${server.host}:${server.port}`);

    await checkApplianceConnection(appliance);
    scheduler.start();
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

void start();
