export const POD_PHASES = ['Pending', 'Running', 'Succeeded', 'Failed', 'Unknown'] as const;

export type PodPhase = (typeof POD_PHASES)[number];

export const PROBE_TYPES = ['startup', 'liveness', 'readiness'] as const;
export const PROBE_ACTIONS = ['fail', 'recover'] as const;

export type ProbeType = (typeof PROBE_TYPES)[number];
export type ProbeAction = (typeof PROBE_ACTIONS)[number];

export interface ProbeStatus {
  started: boolean;
  live: boolean;
  ready: boolean;
}

/**
 * Self-reported state of a pod, as served by its own `/api/info` endpoint.
 * `startupDelay` and `startupReady` are passed through untouched.
 */
export interface PodInfo {
  podName: string;
  podIP: string;
  nodeHostname: string;
  /** Nanoseconds since the container started; approximate once past 2^53 (about 104 days). */
  containerAge: number;
  startTime: string;
  probeStatus: ProbeStatus;
  startupDelay: number;
  startupReady: string;
}

export interface PodDescriptor {
  name: string;
  namespace: string;
  ip: string;
  node: string;
  phase: PodPhase;
}

export interface PodStatusRecord {
  name: string;
  namespace: string;
  ip: string;
  node: string;
  phase: PodPhase;
  replicaSetId: string;
  info: PodInfo | null;
  error: string | null;
  lastCheck: Date;
}

export interface CycleSummary {
  ok: boolean;
  discovered: number;
  fetched: number;
  failed: number;
  removed: string[];
  durationMs: number;
  finishedAt: Date;
}
