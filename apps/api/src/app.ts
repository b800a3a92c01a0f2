import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';

import { env } from './config/env.js';
import { errorHandler } from './core/middleware/error-handler.js';
import { notFoundHandler } from './core/middleware/not-found.js';
import { requestId } from './core/middleware/request-id.js';
import { logger } from './core/logger/index.js';
import type { PodsModule } from './modules/pods/pods.module.js';
import { createApiRouter } from './routes/index.js';

export const createApp = (podsModule: Pick<PodsModule, 'apiRouter' | 'dashboardRouter' | 'reconciler' | 'repository'>) => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(
    cors({
      origin: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Requested-With', 'X-Request-Id'],
    }),
  );

  // The dashboard ships its script and styles inline and is served over plain HTTP inside the cluster.
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          scriptSrc: ["'self'", "'unsafe-inline'"],
          upgradeInsecureRequests: null,
        },
      },
      strictTransportSecurity: false,
    }),
  );
  app.use(express.json({ limit: '64kb' }));
  app.use(requestId);
  app.use(
    pinoHttp({
      logger,
      quietReqLogger: env.NODE_ENV === 'test',
      customProps: (req) => ({ requestId: req.id }),
      // The dashboard polls every second; keep those lines out of info.
      customLogLevel: (_req, res, err) => {
        if (err || res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'debug';
      },
    }),
  );

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/', podsModule.dashboardRouter);
  app.use('/api', createApiRouter(podsModule));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
