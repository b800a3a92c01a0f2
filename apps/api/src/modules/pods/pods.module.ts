import { extractReplicaSetId, type GroupTagExtractor } from '@probe-monitor/common';

import type { Environment } from '../../config/env.js';
import { ReconcileScheduler } from '../../core/scheduler/reconcile-scheduler.js';
import type { BuildInfo } from './dashboard.view.js';
import type { PodDiscovery } from './pod-discovery.js';
import { PodProbeClient } from './pod-probe.client.js';
import { PodReconciler } from './pod-reconciler.service.js';
import { PodSnapshotService } from './pod-snapshot.service.js';
import { InMemoryPodStatusRepository } from './pod-status.memory-repository.js';
import type { PodStatusRepository } from './pod-status.repository.js';
import { ProbeProxyService, type ProxyTargetPolicy } from './probe-proxy.service.js';
import { createPodsRouters } from './pods.router.js';

export interface PodsModuleConfig {
  labelSelector: string;
  namespace?: string;
  kubeconfigPath?: string;
  instancePort: number;
  probeTimeoutMs: number;
  proxyTargetPolicy: ProxyTargetPolicy;
  build: BuildInfo;
}

export interface PodsModuleOverrides {
  discovery?: PodDiscovery;
  repository?: PodStatusRepository;
  extractGroupTag?: GroupTagExtractor;
  now?: () => Date;
}

export const podsConfigFromEnv = (env: Environment): PodsModuleConfig => ({
  labelSelector: env.POD_LABEL_SELECTOR,
  namespace: env.POD_NAMESPACE,
  kubeconfigPath: env.KUBECONFIG,
  instancePort: env.INSTANCE_PORT,
  probeTimeoutMs: env.PROBE_TIMEOUT_MS,
  proxyTargetPolicy: env.PROXY_TARGET_POLICY,
  build: {
    version: env.APP_VERSION,
    commit: env.GIT_COMMIT,
    buildTime: env.BUILD_TIME,
  },
});

async function createKubernetesDiscovery(config: PodsModuleConfig): Promise<PodDiscovery> {
  // Loaded on demand so nothing touches cluster credentials unless discovery is real.
  const { KubernetesPodDiscovery, loadKubeConfig } = await import('./pod-discovery.kubernetes.js');
  return new KubernetesPodDiscovery(loadKubeConfig({ kubeconfigPath: config.kubeconfigPath }));
}

export async function createPodsModule(config: PodsModuleConfig, overrides: PodsModuleOverrides = {}) {
  const discovery = overrides.discovery ?? (await createKubernetesDiscovery(config));
  const repository = overrides.repository ?? new InMemoryPodStatusRepository();
  const probeClient = new PodProbeClient({
    instancePort: config.instancePort,
    timeoutMs: config.probeTimeoutMs,
  });

  const reconciler = new PodReconciler(discovery, probeClient, repository, {
    query: { labelSelector: config.labelSelector, namespace: config.namespace },
    extractGroupTag: overrides.extractGroupTag ?? extractReplicaSetId,
    now: overrides.now,
  });
  const scheduler = new ReconcileScheduler(reconciler);
  const snapshot = new PodSnapshotService(repository);
  const proxy = new ProbeProxyService(probeClient, snapshot, {
    policy: config.proxyTargetPolicy,
    instancePort: config.instancePort,
  });

  const routers = createPodsRouters(snapshot, proxy, {
    build: config.build,
    labelSelector: config.labelSelector,
    instanceUrl: (ip, path) => probeClient.instanceUrl(ip, path),
  });

  return {
    ...routers,
    reconciler,
    scheduler,
    snapshot,
    repository,
    probeClient,
  };
}

export type PodsModule = Awaited<ReturnType<typeof createPodsModule>>;
