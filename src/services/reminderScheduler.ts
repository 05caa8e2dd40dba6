// src/services/reminderScheduler.ts

import type { ReminderContext } from "../context";
import { log } from "../lib/log";
import { subtractCalendarDays, toEpochSeconds, toUtcDate } from "../lib/time";
import { newReminderPayload } from "../types/jobs";
import type { ScheduledReminder, ScheduleResult, SkippedReminder } from "../types/reminders";

type SchedulerDeps = Pick<ReminderContext, "jobs" | "payables" | "clock" | "policy">;

function uniqueSortedOffsets(offsetsDays: readonly number[]): number[] {
  const set = new Set<number>();
  for (const d of offsetsDays) {
    if (!Number.isFinite(d)) {
      throw new Error(`invalid reminder offset: ${d}`);
    }
    set.add(Math.trunc(d));
  }
  return [...set].sort((a, b) => a - b);
}

/**
 * Register one reminder job per day offset before `dueAt`.
 *
 * Idempotent: ids are derived from (payable, offset, eta), so calling again
 * with the same inputs refreshes payload TTLs without adding index entries.
 * Offsets whose eta is not in the future are skipped. When at least one job
 * is scheduled the payable's `scheduled_jobs` mirror is replaced wholesale;
 * when none is, the previous mirror is left as it was.
 *
 * Not transactional across offsets. Store errors propagate and the caller
 * retries the whole call.
 */
export async function scheduleReminderJobs(
  deps: SchedulerDeps,
  payableId: string,
  dueAt: Date | string | number,
  offsetsDays: readonly number[]
): Promise<ScheduleResult> {
  if (!payableId) {
    throw new Error("payableId is required");
  }
  const due = toUtcDate(dueAt);
  const offsets = uniqueSortedOffsets(offsetsDays);

  const now = deps.clock.now();
  const nowEpoch = toEpochSeconds(now);

  const scheduled: ScheduledReminder[] = [];
  const skipped: SkippedReminder[] = [];

  for (const d of offsets) {
    const eta = subtractCalendarDays(due, d);
    if (eta.getTime() <= now.getTime()) {
      log("info", "reminder.skipped", { payableId, offsetDays: d, eta: eta.toISOString() });
      skipped.push({ offsetDays: d, eta, reason: "eta-in-past" });
      continue;
    }

    const etaEpoch = toEpochSeconds(eta);
    const payload = newReminderPayload(payableId, d, etaEpoch);
    const ttl = Math.max(etaEpoch - nowEpoch + deps.policy.retentionAfterEtaSeconds, deps.policy.minTtlSeconds);

    const { inserted } = await deps.jobs.put(payload, ttl);
    log("info", inserted ? "reminder.scheduled" : "reminder.refreshed", {
      payableId,
      offsetDays: d,
      eta: eta.toISOString(),
      jobId: payload.jobId,
      ttl
    });

    scheduled.push({ offsetDays: d, eta, jobId: payload.jobId });
  }

  if (scheduled.length > 0) {
    await deps.payables.replaceScheduledJobs(payableId, scheduled, now);
  }

  return { scheduled, skipped };
}
