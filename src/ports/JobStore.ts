/**
 * JobStore
 *
 * Purpose
 * - Authoritative storage of pending reminder jobs.
 * - A time index (job id -> eta), a payload record per job with a TTL,
 *   and a per-payable set of job ids for reverse lookup.
 *
 * Guarantees expected from implementations
 * - Index and payload are separate records: score queries never load payloads.
 * - put() adds to the time index only when the id is absent, and that
 *   check-and-add is a single atomic store operation.
 * - All mutations are idempotent so callers can retry whole batches.
 *
 * Implementations
 * - infra/redisJobStore.ts (ioredis)
 */

import type { ReminderJobPayload } from "../types/jobs";

export interface JobEntry {
  jobId: string;
  etaEpoch: number;
}

export interface PayableJobEntry {
  jobId: string;
  /** null when the id is still indexed for the payable but gone from the time index. */
  etaEpoch: number | null;
}

export interface JobRemoval {
  jobId: string;
  /** null when the owning payable is unknown; the per-payable index is then left alone. */
  payableId: string | null;
}

export interface JobStore {
  /**
   * Write or refresh the payload with the given TTL, add to the time index if
   * absent, and link the id to its payable. `inserted` is false when the id
   * was already indexed.
   */
  put(payload: ReminderJobPayload, ttlSeconds: number): Promise<{ inserted: boolean }>;

  /** Entries with min <= eta <= max (null = unbounded), ascending, at most `limit`. */
  rangeByScore(min: number | null, max: number | null, limit: number): Promise<JobEntry[]>;

  /** The `limit` soonest entries. */
  head(limit: number): Promise<JobEntry[]>;

  membersForPayable(payableId: string): Promise<PayableJobEntry[]>;

  getPayload(jobId: string): Promise<ReminderJobPayload | null>;

  getPayloads(jobIds: readonly string[]): Promise<Map<string, ReminderJobPayload>>;

  /** Batched delete of payload, time index entry and payable link. Returns the number of index entries removed. */
  remove(entries: readonly JobRemoval[]): Promise<number>;

  /** Remove from the time index; true only for the caller that actually removed it. */
  claim(jobId: string): Promise<boolean>;

  /** Rewrite the payload and put the id back on the time index at a new eta. */
  requeue(payload: ReminderJobPayload, etaEpoch: number, ttlSeconds: number): Promise<void>;
}
