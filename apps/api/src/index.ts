import { createServer } from 'http';

import { createApp } from './app.js';
import { env } from './config/env.js';
import { logger } from './core/logger/index.js';
import { createPodsModule, podsConfigFromEnv } from './modules/pods/pods.module.js';

const port = env.PORT;

async function startServer() {
  logger.info(
    { version: env.APP_VERSION, commit: env.GIT_COMMIT, buildTime: env.BUILD_TIME },
    'Starting pod monitor',
  );

  const podsModule = await createPodsModule(podsConfigFromEnv(env));
  const app = createApp(podsModule);
  const server = createServer(app);

  podsModule.scheduler.start(env.RECONCILE_CRON);

  server.listen(port, () => {
    logger.info(
      { port, labelSelector: env.POD_LABEL_SELECTOR, namespace: env.POD_NAMESPACE ?? 'all', proxyPolicy: env.PROXY_TARGET_POLICY },
      'Pod monitor server started',
    );
  });

  return { server, scheduler: podsModule.scheduler };
}

const { server, scheduler } = await startServer();

const shutdown = async (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Received shutdown signal');

  await scheduler.stop();

  server.close((err?: Error) => {
    if (err) {
      logger.error({ err }, 'Error during server shutdown');
      process.exit(1);
    }
    logger.info('Server closed');
    process.exit();
  });
};

(['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
});
