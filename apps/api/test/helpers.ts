import express, { type Express } from 'express';
import { createServer, type Server } from 'http';

import type { PodDescriptor, PodInfo, PodStatusRecord } from '@probe-monitor/common';

import type { PodDiscovery, PodQuery } from '../src/modules/pods/pod-discovery.js';

export interface RunningServer {
  port: number;
  url: string;
  close: () => Promise<void>;
}

/** Listens on an ephemeral loopback port. */
export async function listen(app: Express): Promise<RunningServer> {
  const server: Server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    port,
    url: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/** A port nothing listens on. */
export async function closedPort(): Promise<number> {
  const running = await listen(express());
  await running.close();
  return running.port;
}

export class StaticDiscovery implements PodDiscovery {
  readonly queries: PodQuery[] = [];
  failure: Error | null = null;

  constructor(public pods: PodDescriptor[] = []) {}

  async listPods(query: PodQuery): Promise<PodDescriptor[]> {
    this.queries.push(query);
    if (this.failure) {
      throw this.failure;
    }
    return this.pods.map((pod) => ({ ...pod }));
  }
}

export const runningPod = (name: string, ip: string, overrides: Partial<PodDescriptor> = {}): PodDescriptor => ({
  name,
  namespace: 'default',
  ip,
  node: 'node-a',
  phase: 'Running',
  ...overrides,
});

export const podInfo = (overrides: Partial<PodInfo> = {}): PodInfo => ({
  podName: 'web-7f8c9d-abcde',
  podIP: '10.0.0.5',
  nodeHostname: 'node-a',
  containerAge: 90_000_000_000,
  startTime: '2024-05-01T10:00:00Z',
  probeStatus: { started: true, live: true, ready: true },
  startupDelay: 5,
  startupReady: 'ready after 5s',
  ...overrides,
});

export const statusRecord = (overrides: Partial<PodStatusRecord> = {}): PodStatusRecord => ({
  name: 'web-7f8c9d-abcde',
  namespace: 'default',
  ip: '10.0.0.5',
  node: 'node-a',
  phase: 'Running',
  replicaSetId: '7f8c9d',
  info: podInfo(),
  error: null,
  lastCheck: new Date('2024-05-01T12:00:00.000Z'),
  ...overrides,
});

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
