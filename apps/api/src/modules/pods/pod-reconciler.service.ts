import {
  extractReplicaSetId,
  fromPromise,
  type CycleSummary,
  type GroupTagExtractor,
  type PodDescriptor,
  type PodStatusRecord,
} from '@probe-monitor/common';

import { logger } from '../../core/logger/index.js';
import { DiscoveryError, describeError } from '../../shared/errors.js';
import type { PodDiscovery, PodQuery } from './pod-discovery.js';
import type { PodProbeClient } from './pod-probe.client.js';
import type { PodStatusRepository } from './pod-status.repository.js';

export type ReconcilerState = 'idle' | 'cycling' | 'stopped';

export interface PodReconcilerOptions {
  query: PodQuery;
  extractGroupTag?: GroupTagExtractor;
  now?: () => Date;
}

/**
 * One discovery-fetch-merge pass per call. Results of a pass are applied to the
 * repository in a single commit, so readers see either the previous pass or this one.
 */
export class PodReconciler {
  private state: ReconcilerState = 'idle';
  private lastSummary: CycleSummary | null = null;
  private readonly extractGroupTag: GroupTagExtractor;
  private readonly now: () => Date;

  constructor(
    private readonly discovery: PodDiscovery,
    private readonly probeClient: Pick<PodProbeClient, 'fetchStatus'>,
    private readonly repository: PodStatusRepository,
    private readonly options: PodReconcilerOptions,
  ) {
    this.extractGroupTag = options.extractGroupTag ?? extractReplicaSetId;
    this.now = options.now ?? (() => new Date());
  }

  getState(): ReconcilerState {
    return this.state;
  }

  getLastSummary(): CycleSummary | null {
    return this.lastSummary;
  }

  isStopped(): boolean {
    return this.state === 'stopped';
  }

  stop(): void {
    if (this.state !== 'stopped') {
      this.state = 'stopped';
      logger.info('Pod reconciler stopped');
    }
  }

  /**
   * Runs one cycle. Resolves to `null` when the cycle did not run to a commit:
   * the reconciler is stopped, another cycle is in flight, or `signal` fired.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary | null> {
    if (this.state !== 'idle' || signal?.aborted) {
      if (signal?.aborted) this.stop();
      return null;
    }

    this.state = 'cycling';
    const startedAt = Date.now();

    try {
      const listed = await fromPromise(
        this.discovery.listPods(this.options.query),
        (error) => new DiscoveryError(`Error listing pods: ${describeError(error)}`, { cause: error }),
      );
      if (!listed.ok) {
        logger.error({ err: listed.error, query: this.options.query }, 'Pod discovery failed; keeping previous state');
        return this.finish({ ok: false, discovered: 0, fetched: 0, failed: 0, removed: [] }, startedAt);
      }
      const pods = listed.value;

      const records: PodStatusRecord[] = [];
      let fetched = 0;
      let failed = 0;

      for (const pod of pods) {
        const record = await this.observe(pod);
        if (record.info) fetched += 1;
        if (record.error) failed += 1;
        records.push(record);
      }

      if (signal?.aborted || this.isStopped()) {
        logger.info({ discovered: pods.length }, 'Reconcile cycle cancelled; discarding results');
        this.stop();
        return null;
      }

      const removed = this.repository.commit(records);
      for (const name of removed) {
        logger.info({ pod: name }, 'Pod no longer present; removed');
      }

      return this.finish({ ok: true, discovered: pods.length, fetched, failed, removed }, startedAt);
    } finally {
      if (this.state === 'cycling') {
        this.state = 'idle';
      }
    }
  }

  private async observe(pod: PodDescriptor): Promise<PodStatusRecord> {
    const previous = this.repository.get(pod.name);
    const record: PodStatusRecord = {
      name: pod.name,
      namespace: pod.namespace,
      ip: pod.ip,
      node: pod.node,
      phase: pod.phase,
      replicaSetId: this.extractGroupTag(pod.name),
      info: null,
      error: null,
      lastCheck: this.observedAt(previous),
    };

    if (pod.phase !== 'Running' || pod.ip === '') {
      return record;
    }

    const result = await this.probeClient.fetchStatus(pod.ip);
    if (result.ok) {
      record.info = result.value;
    } else {
      record.error = result.error.message;
      logger.warn({ pod: pod.name, ip: pod.ip, kind: result.error.kind, err: result.error }, 'Failed to fetch pod status');
    }
    return record;
  }

  // A clock step backwards must not move lastCheck backwards for a known pod.
  private observedAt(previous: PodStatusRecord | null): Date {
    const now = this.now();
    if (previous && previous.lastCheck.getTime() > now.getTime()) {
      return new Date(previous.lastCheck.getTime());
    }
    return now;
  }

  private finish(summary: Omit<CycleSummary, 'durationMs' | 'finishedAt'>, startedAt: number): CycleSummary {
    const finishedAt = new Date();
    const complete: CycleSummary = { ...summary, durationMs: finishedAt.getTime() - startedAt, finishedAt };
    this.lastSummary = complete;
    logger.debug(
      {
        ok: complete.ok,
        discovered: complete.discovered,
        fetched: complete.fetched,
        failed: complete.failed,
        removed: complete.removed.length,
        durationMs: complete.durationMs,
      },
      'Reconcile cycle finished',
    );
    return complete;
  }
}
