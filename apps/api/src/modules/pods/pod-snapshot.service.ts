import type { PodStatusRecord } from '@probe-monitor/common';

import type { PodStatusRepository } from './pod-status.repository.js';

export class PodSnapshotService {
  constructor(private readonly repository: PodStatusRepository) {}

  currentSnapshot(): PodStatusRecord[] {
    return this.repository.snapshot();
  }

  snapshotByName(): Record<string, PodStatusRecord> {
    return Object.fromEntries(this.repository.snapshot().map((record) => [record.name, record]));
  }

  getPod(name: string): PodStatusRecord | null {
    return this.repository.get(name);
  }

  /** Whether `ip` belongs to a pod currently being tracked. */
  isKnownPodIp(ip: string): boolean {
    return ip !== '' && this.repository.snapshot().some((record) => record.ip === ip);
  }
}
