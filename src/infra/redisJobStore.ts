// src/infra/redisJobStore.ts
//
// Redis backed JobStore.
//
// Keys
// - sched:payable_reminders              sorted set, member = job id, score = eta (unix seconds)
// - sched:job:<jobId>                    JSON payload, EX ttl
// - sched:jobs_by_payable:<payableId>    set of job ids, no expiry (cleaned by GC / dispatch)
//
// Multi-key writes go through MULTI so one round trip carries the batch.
// MULTI is not a rollback transaction; every step is idempotent and the
// callers retry the whole operation instead.

import type Redis from "ioredis";
import type { ChainableCommander } from "ioredis";
import type { JobEntry, JobRemoval, JobStore, PayableJobEntry } from "../ports/JobStore";
import { parseStoredPayload, type ReminderJobPayload } from "../types/jobs";

export const ZSET_KEY = "sched:payable_reminders";

export function jobKey(jobId: string): string {
  return `sched:job:${jobId}`;
}

export function payableJobsKey(payableId: string): string {
  return `sched:jobs_by_payable:${payableId}`;
}

async function execOrThrow(batch: ChainableCommander): Promise<unknown[]> {
  const rows = await batch.exec();
  if (!rows) {
    throw new Error("redis batch aborted");
  }
  return rows.map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}

/** Redis replies with flat [member, score, member, score, ...] when WITHSCORES is set. */
function pairs(flat: string[]): JobEntry[] {
  const out: JobEntry[] = [];
  for (let i = 0; i + 1 < flat.length; i += 2) {
    out.push({ jobId: flat[i], etaEpoch: Math.floor(Number(flat[i + 1])) });
  }
  return out;
}

function wholeSeconds(ttlSeconds: number): number {
  return Math.max(1, Math.floor(ttlSeconds));
}

export class RedisJobStore implements JobStore {
  constructor(private readonly redis: Redis) {}

  async put(payload: ReminderJobPayload, ttlSeconds: number): Promise<{ inserted: boolean }> {
    const [, added] = await execOrThrow(
      this.redis
        .multi()
        .set(jobKey(payload.jobId), JSON.stringify(payload), "EX", wholeSeconds(ttlSeconds))
        .zadd(ZSET_KEY, "NX", payload.etaEpoch, payload.jobId)
        .sadd(payableJobsKey(payload.payableId), payload.jobId)
    );
    return { inserted: Number(added) === 1 };
  }

  async rangeByScore(min: number | null, max: number | null, limit: number): Promise<JobEntry[]> {
    if (limit <= 0) return [];
    const flat = await this.redis.zrangebyscore(
      ZSET_KEY,
      min === null ? "-inf" : min,
      max === null ? "+inf" : max,
      "WITHSCORES",
      "LIMIT",
      0,
      limit
    );
    return pairs(flat);
  }

  async head(limit: number): Promise<JobEntry[]> {
    if (limit <= 0) return [];
    const flat = await this.redis.zrange(ZSET_KEY, 0, limit - 1, "WITHSCORES");
    return pairs(flat);
  }

  async membersForPayable(payableId: string): Promise<PayableJobEntry[]> {
    const ids = await this.redis.smembers(payableJobsKey(payableId));
    if (ids.length === 0) return [];
    const batch = this.redis.pipeline();
    for (const id of ids) batch.zscore(ZSET_KEY, id);
    const scores = await execOrThrow(batch);
    return ids.map((jobId, i) => {
      const score = scores[i];
      return {
        jobId,
        etaEpoch: score === null || score === undefined ? null : Math.floor(Number(score))
      };
    });
  }

  async getPayload(jobId: string): Promise<ReminderJobPayload | null> {
    return parseStoredPayload(await this.redis.get(jobKey(jobId)));
  }

  async getPayloads(jobIds: readonly string[]): Promise<Map<string, ReminderJobPayload>> {
    const out = new Map<string, ReminderJobPayload>();
    if (jobIds.length === 0) return out;
    const raws = await this.redis.mget(...jobIds.map(jobKey));
    jobIds.forEach((id, i) => {
      const payload = parseStoredPayload(raws[i] ?? null);
      if (payload) out.set(id, payload);
    });
    return out;
  }

  async remove(entries: readonly JobRemoval[]): Promise<number> {
    if (entries.length === 0) return 0;
    const batch = this.redis.multi();
    for (const { jobId, payableId } of entries) {
      batch.del(jobKey(jobId));
      batch.zrem(ZSET_KEY, jobId);
      if (payableId) batch.srem(payableJobsKey(payableId), jobId);
    }
    const results = await execOrThrow(batch);
    let removed = 0;
    let i = 0;
    for (const { payableId } of entries) {
      removed += Number(results[i + 1]);
      i += payableId ? 3 : 2;
    }
    return removed;
  }

  async claim(jobId: string): Promise<boolean> {
    return Number(await this.redis.zrem(ZSET_KEY, jobId)) === 1;
  }

  async requeue(payload: ReminderJobPayload, etaEpoch: number, ttlSeconds: number): Promise<void> {
    await execOrThrow(
      this.redis
        .multi()
        .set(jobKey(payload.jobId), JSON.stringify(payload), "EX", wholeSeconds(ttlSeconds))
        .zadd(ZSET_KEY, etaEpoch, payload.jobId)
        .sadd(payableJobsKey(payload.payableId), payload.jobId)
    );
  }
}
