import { CoreV1Api, KubeConfig, type V1Pod } from '@kubernetes/client-node';
import { normalizePodPhase, type PodDescriptor } from '@probe-monitor/common';

import { logger } from '../../core/logger/index.js';
import type { PodDiscovery, PodQuery } from './pod-discovery.js';

export interface KubeConfigOptions {
  kubeconfigPath?: string;
}

/**
 * In-cluster service account first, then an explicit kubeconfig path,
 * then the usual `$KUBECONFIG` / `~/.kube/config` lookup.
 */
export function loadKubeConfig(options: KubeConfigOptions = {}): KubeConfig {
  const kubeConfig = new KubeConfig();

  if (process.env.KUBERNETES_SERVICE_HOST) {
    kubeConfig.loadFromCluster();
    logger.info('Using in-cluster Kubernetes configuration');
  } else if (options.kubeconfigPath) {
    kubeConfig.loadFromFile(options.kubeconfigPath);
    logger.info({ kubeconfig: options.kubeconfigPath }, 'Using kubeconfig file');
  } else {
    kubeConfig.loadFromDefault();
    logger.info({ context: kubeConfig.getCurrentContext() }, 'Using default kubeconfig');
  }

  return kubeConfig;
}

export const toPodDescriptor = (pod: V1Pod): PodDescriptor => ({
  name: pod.metadata?.name ?? '',
  namespace: pod.metadata?.namespace ?? '',
  ip: pod.status?.podIP ?? '',
  node: pod.spec?.nodeName ?? '',
  phase: normalizePodPhase(pod.status?.phase),
});

export class KubernetesPodDiscovery implements PodDiscovery {
  private readonly coreApi: CoreV1Api;

  constructor(kubeConfig: KubeConfig) {
    this.coreApi = kubeConfig.makeApiClient(CoreV1Api);
  }

  async listPods({ labelSelector, namespace }: PodQuery): Promise<PodDescriptor[]> {
    const podList = namespace
      ? await this.coreApi.listNamespacedPod({ namespace, labelSelector })
      : await this.coreApi.listPodForAllNamespaces({ labelSelector });

    return podList.items.map(toPodDescriptor).filter((pod) => pod.name.length > 0);
  }
}
