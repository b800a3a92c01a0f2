import express, { Router } from 'express';

import { validateRequest } from '../../shared/http/validate-request.js';
import type { DashboardView } from './dashboard.view.js';
import type { PodSnapshotService } from './pod-snapshot.service.js';
import type { ProbeProxyService } from './probe-proxy.service.js';
import { createPodsController } from './pods.controller.js';
import { podNameParamsSchema, proxyBodySchema } from './pods.schemas.js';

export const createPodsRouters = (snapshot: PodSnapshotService, proxy: ProbeProxyService, view: DashboardView) => {
  const controller = createPodsController(snapshot, proxy, view);

  const dashboardRouter = Router();
  dashboardRouter.get('/', controller.renderDashboard);

  const apiRouter = Router();

  // Snapshot (read-only)
  apiRouter.get('/pods', controller.listPods);
  apiRouter.get('/pods/:name', validateRequest({ params: podNameParamsSchema }), controller.getPod);

  // Probe toggle relay; the body is JSON whatever Content-Type the caller sends.
  apiRouter.post(
    '/proxy',
    express.json({ type: () => true, limit: '64kb' }),
    validateRequest({ body: proxyBodySchema }),
    controller.proxy,
  );
  apiRouter.all('/proxy', controller.methodNotAllowed);

  return { dashboardRouter, apiRouter };
};
