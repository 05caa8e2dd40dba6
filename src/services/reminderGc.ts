// src/services/reminderGc.ts
//
// Periodic sweep for reminder jobs whose eta is more than the grace window
// in the past. Bounded per run; oldest jobs go first so a backlog drains in
// eta order.

import type { ReminderContext } from "../context";
import { errorMessage, log } from "../lib/log";
import { toEpochSeconds } from "../lib/time";
import type { JobRemoval } from "../ports/JobStore";
import { parseReminderJobId } from "../types/jobs";
import type { GcResult } from "../types/reminders";

type GcDeps = Pick<ReminderContext, "jobs" | "payables" | "clock" | "policy">;

/**
 * Delete jobs with eta <= now - grace: payload, time index entry and payable
 * link in one batch, then pull the ids from each payable's mirror.
 *
 * Job store failures propagate (the sweep is safe to rerun). Mirror failures
 * are logged and skipped since the mirror is informational.
 */
export async function pruneExpiredJobsByEta(deps: GcDeps, maxToPrune = 1000): Promise<GcResult> {
  const cutoff = toEpochSeconds(deps.clock.now()) - deps.policy.gcGraceSeconds;

  const candidates = await deps.jobs.rangeByScore(null, cutoff, maxToPrune);

  const removals: JobRemoval[] = [];
  const byPayable = new Map<string, string[]>();
  for (const { jobId } of candidates) {
    const payableId = parseReminderJobId(jobId)?.payableId ?? null;
    if (payableId === null) {
      log("warn", "reminder.gc_unparseable_id", { jobId });
    } else {
      const ids = byPayable.get(payableId) ?? [];
      ids.push(jobId);
      byPayable.set(payableId, ids);
    }
    removals.push({ jobId, payableId });
  }

  if (removals.length > 0) {
    await deps.jobs.remove(removals);
  }

  for (const [payableId, jobIds] of byPayable) {
    try {
      await deps.payables.pullScheduledJobs(payableId, jobIds);
    } catch (err) {
      log("warn", "reminder.gc_mirror_failed", { payableId, error: errorMessage(err) });
    }
  }

  const result: GcResult = { examined: candidates.length, pruned: removals.length, cutoff };
  log("info", "reminder.gc", { ...result });
  return result;
}
