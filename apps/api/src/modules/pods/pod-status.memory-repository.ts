import type { PodStatusRecord } from '@probe-monitor/common';

import type { PodStatusRepository } from './pod-status.repository.js';

const copyRecord = (record: PodStatusRecord): PodStatusRecord => structuredClone(record);

export class InMemoryPodStatusRepository implements PodStatusRepository {
  private readonly records = new Map<string, PodStatusRecord>();

  constructor(seed: PodStatusRecord[] = []) {
    seed.forEach((record) => {
      this.records.set(record.name, copyRecord(record));
    });
  }

  get(name: string): PodStatusRecord | null {
    const record = this.records.get(name);
    return record ? copyRecord(record) : null;
  }

  upsert(record: PodStatusRecord): void {
    this.records.set(record.name, copyRecord(record));
  }

  remove(name: string): void {
    this.records.delete(name);
  }

  snapshot(): PodStatusRecord[] {
    return Array.from(this.records.values(), copyRecord);
  }

  pruneExcept(names: ReadonlySet<string>): string[] {
    const removed: string[] = [];
    for (const name of this.records.keys()) {
      if (!names.has(name)) {
        this.records.delete(name);
        removed.push(name);
      }
    }
    return removed;
  }

  commit(records: readonly PodStatusRecord[]): string[] {
    const seen = new Set<string>();
    for (const record of records) {
      this.upsert(record);
      seen.add(record.name);
    }
    return this.pruneExcept(seen);
  }

  size(): number {
    return this.records.size;
  }
}
