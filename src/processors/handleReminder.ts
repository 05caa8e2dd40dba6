/**
 * Reminder processor
 *
 * Fires one due payable reminder.
 *
 * Responsibilities
 * - Load the payable; a missing payable makes the reminder stale.
 * - Skip payables that are cancelled or completed.
 * - Remain idempotent on (payableId, offsetDays) by checking the reminder
 *   history before sending.
 * - Send through NotifyPort, then record the reminder and mark the payable
 *   as notified.
 *
 * Outputs
 * - Returns { action: "notified" | "noop", reason? } for logs.
 * - Throws when notification or persistence fails so the dispatcher can requeue.
 */

import type { ReminderContext } from "../context";
import { log } from "../lib/log";
import { subtractCalendarDays, toEpochSeconds } from "../lib/time";
import type { ReminderChannel } from "../ports/NotifyPort";
import type { ReminderJobPayload } from "../types/jobs";

type HandlerDeps = Pick<ReminderContext, "payables" | "notify" | "cipher" | "clock">;

export type ReminderOutcome =
  | { action: "notified"; payableId: string; offsetDays: number }
  | {
      action: "noop";
      payableId: string;
      offsetDays: number;
      reason: "payable-missing" | "payable-closed" | "already-reminded";
    };

const CLOSED_STATUSES = new Set(["cancelled", "completed"]);
const CHANNELS: ReminderChannel[] = ["email", "sms"];

function formatDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function formatMinute(d: Date): string {
  return `${d.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export async function handleReminder(payload: ReminderJobPayload, deps: HandlerDeps): Promise<ReminderOutcome> {
  const { payableId, offsetDays } = payload;

  const payable = await deps.payables.findPayable(payableId);
  if (!payable) {
    log("info", "reminder.payable_missing", { payableId, jobId: payload.jobId });
    return { action: "noop", payableId, offsetDays, reason: "payable-missing" };
  }

  const status = (deps.cipher.decryptDisplay(payable.status) ?? "").toLowerCase();
  if (CLOSED_STATUSES.has(status)) {
    log("info", "reminder.payable_closed", { payableId, status });
    return { action: "noop", payableId, offsetDays, reason: "payable-closed" };
  }

  if (payable.reminders.some(r => r.offsetDays === offsetDays)) {
    log("info", "reminder.already_sent", { payableId, offsetDays });
    return { action: "noop", payableId, offsetDays, reason: "already-reminded" };
  }

  const name = deps.cipher.decryptDisplay(payable.name);
  const reference = deps.cipher.decryptDisplay(payable.reference);
  const currency = deps.cipher.decryptDisplay(payable.currency) ?? "";
  const amount = deps.cipher.decryptDisplay(payable.amount) ?? "";
  const label = name ?? reference ?? payableId;
  const dueAt = payable.dueAt;

  const now = deps.clock.now();
  await deps.notify.sendReminder({
    payableId,
    offsetDays,
    when: toEpochSeconds(now),
    channels: CHANNELS,
    subject: dueAt ? `[Reminder] ${label} due on ${formatDay(dueAt)}` : `[Reminder] ${label}`,
    body:
      `Payable ${reference ?? label} of ${`${currency} ${amount}`.trim()} ` +
      (dueAt ? `is due on ${formatMinute(dueAt)} ` : "is due soon ") +
      `(scheduled ${offsetDays} day(s) in advance).`,
    context: { businessId: payable.businessId, createdBy: payable.createdBy }
  });

  await deps.payables.recordReminderSent(
    payableId,
    {
      offsetDays,
      scheduledFor: dueAt ? subtractCalendarDays(dueAt, offsetDays) : null,
      sentAt: now,
      channels: CHANNELS,
      success: true
    },
    deps.cipher.encrypt("notified"),
    now
  );

  return { action: "notified", payableId, offsetDays };
}
