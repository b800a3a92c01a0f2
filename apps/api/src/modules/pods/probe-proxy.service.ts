import { PROBE_ACTIONS, PROBE_TYPES, type ProxyRequest } from '@probe-monitor/common';

import { logger } from '../../core/logger/index.js';
import { ForbiddenError } from '../../shared/errors.js';
import type { PodProbeClient, RelayResponse } from './pod-probe.client.js';
import type { PodSnapshotService } from './pod-snapshot.service.js';

export type ProxyTargetPolicy = 'known-pods' | 'any';

const PROBE_PATH = new RegExp(`^/api/probes/(${PROBE_TYPES.join('|')})/(${PROBE_ACTIONS.join('|')})$`);

export interface ProbeProxyOptions {
  policy: ProxyTargetPolicy;
  instancePort: number;
}

/**
 * Same-origin relay for the dashboard's probe toggles. With the `known-pods` policy only
 * probe endpoints of pods in the current snapshot can be reached; `any` relays every URL.
 */
export class ProbeProxyService {
  constructor(
    private readonly probeClient: Pick<PodProbeClient, 'forward'>,
    private readonly snapshot: Pick<PodSnapshotService, 'isKnownPodIp'>,
    private readonly options: ProbeProxyOptions,
  ) {}

  async relay({ url, method }: ProxyRequest): Promise<RelayResponse> {
    if (this.options.policy === 'known-pods') {
      this.assertProbeTarget(url);
    }

    const response = await this.probeClient.forward(url, method);
    logger.info({ url, method, status: response.status }, 'Relayed probe request');
    return response;
  }

  private assertProbeTarget(rawUrl: string): void {
    const target = new URL(rawUrl);
    const host = target.hostname.replace(/^\[(.*)\]$/, '$1');
    const port = target.port === '' ? 80 : Number(target.port);

    const allowed =
      target.protocol === 'http:' &&
      port === this.options.instancePort &&
      PROBE_PATH.test(target.pathname) &&
      this.snapshot.isKnownPodIp(host);

    if (!allowed) {
      throw new ForbiddenError('Proxy target is not a probe endpoint of a monitored pod', { url: rawUrl });
    }
  }
}
