import { Router } from 'express';

import type { PodsModule } from '../modules/pods/pods.module.js';
import { createHealthRouter } from './health.js';

export function createApiRouter(podsModule: Pick<PodsModule, 'apiRouter' | 'reconciler' | 'repository'>): Router {
  const router = Router();

  router.use('/health', createHealthRouter(podsModule.reconciler, podsModule.repository));
  router.use('/', podsModule.apiRouter);

  return router;
}
