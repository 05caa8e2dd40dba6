/**
 * RedisJobStore tests
 *
 * Runs the real store against ioredis-mock so key layout, conditional adds
 * and batched removals are exercised without a Redis server.
 */

import RedisMock from "ioredis-mock";
import { beforeEach, describe, expect, it } from "vitest";
import {
  RedisJobStore,
  ZSET_KEY,
  jobKey,
  payableJobsKey
} from "../../src/infra/redisJobStore";
import { newReminderPayload } from "../../src/types/jobs";

let redis: InstanceType<typeof RedisMock>;
let store: RedisJobStore;

beforeEach(async () => {
  redis = new RedisMock();
  await redis.flushall();
  store = new RedisJobStore(redis);
});

describe("RedisJobStore.put", () => {
  it("writes payload, time index and payable link", async () => {
    const p = newReminderPayload("P1", 2, 1000);
    const res = await store.put(p, 3600);

    expect(res).toEqual({ inserted: true });
    expect(JSON.parse((await redis.get(jobKey(p.jobId))) ?? "null")).toEqual(p);
    expect(Number(await redis.zscore(ZSET_KEY, p.jobId))).toBe(1000);
    expect(await redis.smembers(payableJobsKey("P1"))).toEqual([p.jobId]);

    const ttl = await redis.ttl(jobKey(p.jobId));
    expect(ttl).toBeGreaterThan(3590);
    expect(ttl).toBeLessThanOrEqual(3600);
  });

  it("does not duplicate the index entry on a second put but refreshes the payload", async () => {
    const p = newReminderPayload("P1", 2, 1000);
    await store.put(p, 60);
    const again = await store.put(p, 7200);

    expect(again).toEqual({ inserted: false });
    expect(await redis.zcard(ZSET_KEY)).toBe(1);
    expect(await redis.scard(payableJobsKey("P1"))).toBe(1);
    expect(await redis.ttl(jobKey(p.jobId))).toBeGreaterThan(3600);
  });
});

describe("RedisJobStore reads", () => {
  beforeEach(async () => {
    await store.put(newReminderPayload("P1", 9, 100), 3600);
    await store.put(newReminderPayload("P1", 5, 500), 3600);
    await store.put(newReminderPayload("P2", 1, 900), 3600);
  });

  it("ranges by score inclusively, ascending, capped", async () => {
    expect(await store.rangeByScore(100, 500, 10)).toEqual([
      { jobId: "payable:P1:off:9:at:100", etaEpoch: 100 },
      { jobId: "payable:P1:off:5:at:500", etaEpoch: 500 }
    ]);
    expect(await store.rangeByScore(null, null, 2)).toEqual([
      { jobId: "payable:P1:off:9:at:100", etaEpoch: 100 },
      { jobId: "payable:P1:off:5:at:500", etaEpoch: 500 }
    ]);
    expect(await store.rangeByScore(501, null, 10)).toEqual([
      { jobId: "payable:P2:off:1:at:900", etaEpoch: 900 }
    ]);
    expect(await store.rangeByScore(null, null, 0)).toEqual([]);
  });

  it("returns the soonest entries from head()", async () => {
    expect((await store.head(1)).map(e => e.etaEpoch)).toEqual([100]);
    expect((await store.head(10)).map(e => e.etaEpoch)).toEqual([100, 500, 900]);
    expect(await store.head(0)).toEqual([]);
  });

  it("lists payable members with null scores for ids gone from the index", async () => {
    await redis.zrem(ZSET_KEY, "payable:P1:off:9:at:100");
    const members = await store.membersForPayable("P1");
    const byId = new Map(members.map(m => [m.jobId, m.etaEpoch]));
    expect(byId.get("payable:P1:off:9:at:100")).toBeNull();
    expect(byId.get("payable:P1:off:5:at:500")).toBe(500);
    expect(await store.membersForPayable("nobody")).toEqual([]);
  });

  it("loads payloads singly and in bulk, skipping missing or corrupt ones", async () => {
    await redis.set(jobKey("payable:P2:off:1:at:900"), "{corrupt");
    expect(await store.getPayload("payable:P1:off:5:at:500")).toEqual(newReminderPayload("P1", 5, 500));
    expect(await store.getPayload("payable:P9:off:1:at:1")).toBeNull();

    const many = await store.getPayloads([
      "payable:P1:off:9:at:100",
      "payable:P2:off:1:at:900",
      "payable:P9:off:1:at:1"
    ]);
    expect([...many.keys()]).toEqual(["payable:P1:off:9:at:100"]);
  });
});

describe("RedisJobStore writes used by GC and dispatch", () => {
  it("removes payload, index entry and payable link in one batch", async () => {
    await store.put(newReminderPayload("P1", 1, 100), 3600);
    await store.put(newReminderPayload("P1", 2, 200), 3600);
    await redis.zadd(ZSET_KEY, 50, "legacy-id");

    const removed = await store.remove([
      { jobId: "payable:P1:off:1:at:100", payableId: "P1" },
      { jobId: "legacy-id", payableId: null }
    ]);

    expect(removed).toBe(2);
    expect(await redis.get(jobKey("payable:P1:off:1:at:100"))).toBeNull();
    expect(await redis.zrange(ZSET_KEY, 0, -1)).toEqual(["payable:P1:off:2:at:200"]);
    expect(await redis.smembers(payableJobsKey("P1"))).toEqual(["payable:P1:off:2:at:200"]);
    expect(await store.remove([])).toBe(0);
  });

  it("lets only one caller claim a job", async () => {
    await store.put(newReminderPayload("P1", 1, 100), 3600);
    expect(await store.claim("payable:P1:off:1:at:100")).toBe(true);
    expect(await store.claim("payable:P1:off:1:at:100")).toBe(false);
  });

  it("requeues a claimed job and removes it once handled", async () => {
    const p = newReminderPayload("P1", 1, 100);
    await store.put(p, 3600);
    await store.claim(p.jobId);

    await store.requeue({ ...p, attempts: 1 }, 400, 600);
    expect(Number(await redis.zscore(ZSET_KEY, p.jobId))).toBe(400);
    expect((await store.getPayload(p.jobId))?.attempts).toBe(1);

    await store.claim(p.jobId);
    expect(await store.remove([{ jobId: p.jobId, payableId: "P1" }])).toBe(0);
    expect(await redis.get(jobKey(p.jobId))).toBeNull();
    expect(await redis.smembers(payableJobsKey("P1"))).toEqual([]);
  });
});
