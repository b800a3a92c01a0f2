import { Router } from 'express';
import os from 'os';

import type { PodReconciler } from '../modules/pods/pod-reconciler.service.js';
import type { PodStatusRepository } from '../modules/pods/pod-status.repository.js';

export const createHealthRouter = (
  reconciler: Pick<PodReconciler, 'getState' | 'getLastSummary'>,
  repository: Pick<PodStatusRepository, 'size'>,
) => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      hostname: os.hostname(),
      uptime: process.uptime(),
      reconciler: {
        state: reconciler.getState(),
        lastCycle: reconciler.getLastSummary(),
      },
      pods: repository.size(),
    });
  });

  return router;
};
