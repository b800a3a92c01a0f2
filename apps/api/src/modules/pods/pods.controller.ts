import type { NextFunction, Request, Response } from 'express';

import { asyncHandler } from '../../shared/http/async-handler.js';
import { MethodNotAllowedError, NotFoundError } from '../../shared/errors.js';
import { renderDashboard, type DashboardView } from './dashboard.view.js';
import type { PodSnapshotService } from './pod-snapshot.service.js';
import type { ProbeProxyService } from './probe-proxy.service.js';
import type { PodNameParams, ProxyBody } from './pods.schemas.js';

export const createPodsController = (
  snapshot: PodSnapshotService,
  proxy: ProbeProxyService,
  view: DashboardView,
) => ({
  renderDashboard: (_req: Request, res: Response) => {
    res.type('html').send(renderDashboard(snapshot.currentSnapshot(), view));
  },

  listPods: (_req: Request, res: Response) => {
    res.json(snapshot.snapshotByName());
  },

  getPod: (req: Request, res: Response) => {
    const { name } = req.params as PodNameParams;
    const pod = snapshot.getPod(name);
    if (!pod) {
      throw new NotFoundError(`Pod ${name} is not being monitored`);
    }
    res.json(pod);
  },

  // Status, content type and body of the pod's answer are passed through as-is.
  proxy: asyncHandler(async (req: Request, res: Response) => {
    const relayed = await proxy.relay(req.body as ProxyBody);

    res.status(relayed.status);
    if (relayed.contentType) {
      res.setHeader('Content-Type', relayed.contentType);
    }
    res.end(relayed.body);
  }),

  methodNotAllowed: (_req: Request, _res: Response, next: NextFunction) => {
    next(new MethodNotAllowedError(['POST']));
  },
});
