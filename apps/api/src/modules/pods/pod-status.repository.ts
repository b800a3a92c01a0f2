import type { PodStatusRecord } from '@probe-monitor/common';

/**
 * Process-wide store of the last known status of every discovered pod, keyed by pod name.
 *
 * Every method runs to completion synchronously, so on Node's single thread each call is
 * its own critical section: a reader never sees a half-applied write and writes never
 * interleave. Returned records are copies and stay valid across `await` points.
 */
export interface PodStatusRepository {
  get(name: string): PodStatusRecord | null;
  upsert(record: PodStatusRecord): void;
  remove(name: string): void;
  snapshot(): PodStatusRecord[];
  /** Removes every record whose name is not in `names`; returns the removed names. */
  pruneExcept(names: ReadonlySet<string>): string[];
  /** Upserts one cycle's records and prunes to exactly their names, in one step. */
  commit(records: readonly PodStatusRecord[]): string[];
  size(): number;
}
