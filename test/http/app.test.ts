/**
 * HTTP surface tests
 *
 * The app is bound to an ephemeral port and driven with fetch; stores are
 * the in-process fakes from the test context.
 */

import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../../src/http/app";
import { ZSET_KEY } from "../../src/infra/redisJobStore";
import { createTestContext, type TestContext } from "../_fakes/context";

const PID = "65a000000000000000000001";

let ctx: TestContext;
let server: Server;
let base: string;

beforeEach(async () => {
  ctx = await createTestContext("2026-01-01T00:00:00Z");
  const app = createApp(ctx);
  await new Promise<void>(resolve => {
    server = app.listen(0, () => resolve());
  });
  const { port } = server.address() as AddressInfo;
  base = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

// Loose view of a JSON response body.
type Body = Record<string, any>;

async function json(res: Response): Promise<Body> {
  return (await res.json()) as Body;
}

function post(path: string, body: unknown) {
  return fetch(`${base}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

describe("reminders HTTP API", () => {
  it("answers the health check", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ ok: true, service: "payable-reminders", time: "2026-01-01T00:00:00.000Z" });
  });

  it("schedules reminders and lists them back", async () => {
    const res = await post(`/payables/${PID}/reminders`, { dueAt: "2026-01-10T00:00:00Z", offsetsDays: [7, 2] });
    expect(res.status).toBe(201);
    const body = await json(res);
    expect(body.ok).toBe(true);
    expect(body.scheduled.map((s: { jobId: string }) => s.jobId)).toEqual([
      `payable:${PID}:off:2:at:1767830400`,
      `payable:${PID}:off:7:at:1767398400`
    ]);

    const listed = await json(await fetch(`${base}/payables/${PID}/reminders`));
    expect(listed.jobs.map((j: { etaIso: string }) => j.etaIso)).toEqual([
      "2026-01-03T00:00:00.000Z",
      "2026-01-08T00:00:00.000Z"
    ]);
  });

  it("returns 200 when every offset is past due", async () => {
    const res = await post(`/payables/${PID}/reminders`, { dueAt: "2025-12-01T00:00:00Z", offsetsDays: [1] });
    expect(res.status).toBe(200);
    expect((await json(res)).scheduled).toEqual([]);
  });

  it("rejects invalid bodies with the failing paths", async () => {
    const res = await post(`/payables/${PID}/reminders`, { dueAt: "whenever", offsetsDays: [1.5] });
    expect(res.status).toBe(400);
    const body = await json(res);
    expect(body.error).toBe("invalid request");
    expect(body.issues.map((i: { path: string }) => i.path)).toEqual(["dueAt", "offsetsDays.0"]);
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${base}/payables/${PID}/reminders`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{oops"
    });
    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ ok: false, error: "malformed JSON body" });
  });

  it("serves next-due and window queries, hydrating on request", async () => {
    ctx.payableStore.add({ id: PID, name: ctx.cipher.encrypt("Office rent") });
    await post(`/payables/${PID}/reminders`, { dueAt: "2026-01-10T00:00:00Z", offsetsDays: [7, 2] });

    const next = await json(await fetch(`${base}/reminders/next-due?limit=1&hydrate=1`));
    expect(next.jobs).toHaveLength(1);
    expect(next.jobs[0].offsetDays).toBe(7);
    expect(next.jobs[0].payable.name).toBe("Office rent");

    const win = await json(await fetch(`${base}/reminders/window?start=2026-01-05T00:00:00Z`));
    expect(win.jobs.map((j: { offsetDays: number }) => j.offsetDays)).toEqual([2]);
    expect(win.jobs[0].payable).toBeUndefined();
  });

  it("rejects a non-numeric limit", async () => {
    const res = await fetch(`${base}/reminders/next-due?limit=lots`);
    expect(res.status).toBe(400);
  });

  it("reads the mirror", async () => {
    ctx.payableStore.add({ id: PID, businessId: "B1" });
    await post(`/payables/${PID}/reminders`, { dueAt: "2026-01-10T00:00:00Z", offsetsDays: [2] });

    const body = await json(await fetch(`${base}/reminders/mirror?businessId=B1`));
    expect(body.jobs).toEqual([
      {
        payableId: PID,
        jobId: `payable:${PID}:off:2:at:1767830400`,
        offsetDays: 2,
        etaIso: "2026-01-08T00:00:00.000Z"
      }
    ]);
  });

  it("runs a GC sweep on demand", async () => {
    await ctx.redis.zadd(ZSET_KEY, 1767225600 - 7200, `payable:${PID}:off:1:at:${1767225600 - 7200}`);

    const res = await post("/reminders/gc", {});
    expect(await json(res)).toEqual({ ok: true, examined: 1, pruned: 1, cutoff: 1767225600 - 3600 });
  });

  it("answers unknown routes with 404", async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await json(res)).toEqual({ ok: false, error: "not found" });
  });
});
