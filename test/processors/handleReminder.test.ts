/**
 * handleReminder processor tests
 *
 * Goals
 * - Prove a live payable is notified once and the reminder is recorded.
 * - Prove NOOP when the payable is gone, closed, or already reminded for the offset.
 * - Prove notifier failures propagate and nothing is recorded.
 *
 * Test strategy
 * - In-memory PayableStore and a recording NotifyPort; no Redis needed.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { handleReminder } from "../../src/processors/handleReminder";
import { newReminderPayload } from "../../src/types/jobs";
import { createTestContext, type TestContext } from "../_fakes/context";

const PID = "65a000000000000000000001";
const NOW = "2026-01-03T00:00:00Z";
const ETA = 1767398400; // 2026-01-03T00:00:00Z

let ctx: TestContext;

function addPayable(status = "pending") {
  const enc = (v: unknown) => ctx.cipher.encrypt(v);
  return ctx.payableStore.add({
    id: PID,
    name: enc("Office rent"),
    reference: enc("INV-001"),
    currency: enc("GHS"),
    amount: enc(1250),
    status: enc(status),
    dueAt: new Date("2026-01-10T00:00:00Z"),
    businessId: "B1",
    createdBy: "U1"
  });
}

beforeEach(async () => {
  ctx = await createTestContext(NOW);
});

describe("handleReminder", () => {
  it("notifies, records the reminder and marks the payable notified", async () => {
    const stored = addPayable();

    const res = await handleReminder(newReminderPayload(PID, 7, ETA), ctx);

    expect(res).toEqual({ action: "notified", payableId: PID, offsetDays: 7 });
    expect(ctx.notifier.sent).toEqual([
      {
        payableId: PID,
        offsetDays: 7,
        when: ETA,
        channels: ["email", "sms"],
        subject: "[Reminder] Office rent due on 2026-01-10",
        body: "Payable INV-001 of GHS 1250 is due on 2026-01-10 00:00 UTC (scheduled 7 day(s) in advance).",
        context: { businessId: "B1", createdBy: "U1" }
      }
    ]);
    expect(stored.reminderLog).toEqual([
      {
        offsetDays: 7,
        scheduledFor: new Date("2026-01-03T00:00:00Z"),
        sentAt: new Date(NOW),
        channels: ["email", "sms"],
        success: true
      }
    ]);
    expect(ctx.cipher.decrypt(stored.record.status ?? "")).toBe("notified");
    expect(stored.updatedAt).toEqual(new Date(NOW));
  });

  it("falls back to the payable id when name and reference are unreadable", async () => {
    ctx.payableStore.add({ id: PID, dueAt: null, name: "not-ciphertext" });

    await handleReminder(newReminderPayload(PID, 1, ETA), ctx);

    expect(ctx.notifier.sent[0].subject).toBe(`[Reminder] ${PID}`);
    expect(ctx.notifier.sent[0].body).toBe(`Payable ${PID} of  is due soon (scheduled 1 day(s) in advance).`);
  });

  it("no-ops when the payable no longer exists", async () => {
    const res = await handleReminder(newReminderPayload(PID, 7, ETA), ctx);

    expect(res).toEqual({ action: "noop", payableId: PID, offsetDays: 7, reason: "payable-missing" });
    expect(ctx.notifier.sent).toHaveLength(0);
  });

  it.each(["cancelled", "Completed"])("no-ops when the payable is %s", async status => {
    addPayable(status);

    const res = await handleReminder(newReminderPayload(PID, 7, ETA), ctx);

    expect(res).toMatchObject({ action: "noop", reason: "payable-closed" });
    expect(ctx.notifier.sent).toHaveLength(0);
    expect(ctx.payableStore.callsTo("recordReminderSent")).toHaveLength(0);
  });

  it("is idempotent per offset", async () => {
    addPayable();
    await handleReminder(newReminderPayload(PID, 7, ETA), ctx);

    const again = await handleReminder(newReminderPayload(PID, 7, ETA), ctx);
    const other = await handleReminder(newReminderPayload(PID, 2, ETA + 5 * 86400), ctx);

    expect(again).toMatchObject({ action: "noop", reason: "already-reminded" });
    expect(other).toMatchObject({ action: "notified", offsetDays: 2 });
    expect(ctx.notifier.sent.map(s => s.offsetDays)).toEqual([7, 2]);
  });

  it("propagates notifier failures without recording anything", async () => {
    addPayable();
    ctx.notifier.failWith = new Error("smtp unavailable");

    await expect(handleReminder(newReminderPayload(PID, 7, ETA), ctx)).rejects.toThrow("smtp unavailable");
    expect(ctx.payableStore.callsTo("recordReminderSent")).toHaveLength(0);
  });
});
