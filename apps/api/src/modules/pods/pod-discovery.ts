import type { PodDescriptor } from '@probe-monitor/common';

export interface PodQuery {
  labelSelector: string;
  /** All namespaces when omitted. */
  namespace?: string;
}

export interface PodDiscovery {
  listPods(query: PodQuery): Promise<PodDescriptor[]>;
}
