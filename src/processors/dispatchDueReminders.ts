/**
 * Due-reminder dispatcher
 *
 * One bounded pass over the time index:
 * - read up to `dispatchBatch` ids whose eta has passed, oldest first;
 * - claim each with ZREM so concurrent workers never run the same job;
 * - run handleReminder, then drop the payload and payable link and pull the
 *   id from the payable's `scheduled_jobs` mirror;
 * - on failure bump `attempts` and put the job back `retryDelaySeconds`
 *   later, or drop it after `maxRetries`.
 *
 * Invoked by the maintenance worker on a repeat schedule.
 */

import type { ReminderContext } from "../context";
import { errorMessage, log } from "../lib/log";
import { toEpochSeconds } from "../lib/time";
import { parseReminderJobId } from "../types/jobs";
import { handleReminder } from "./handleReminder";

export interface DispatchResult {
  examined: number;
  claimed: number;
  processed: number;
  requeued: number;
  dropped: number;
}

/**
 * Drop a finished job everywhere it is referenced. A mirror failure is logged
 * and left for the next schedule replace; the job store is authoritative.
 */
async function finish(deps: ReminderContext, jobId: string, payableId: string | null): Promise<void> {
  await deps.jobs.remove([{ jobId, payableId }]);
  if (payableId === null) return;
  try {
    await deps.payables.pullScheduledJobs(payableId, [jobId]);
  } catch (err) {
    log("warn", "reminder.mirror_pull_failed", { payableId, jobId, error: errorMessage(err) });
  }
}

export async function dispatchDueReminders(deps: ReminderContext): Promise<DispatchResult> {
  const nowEpoch = toEpochSeconds(deps.clock.now());
  const due = await deps.jobs.rangeByScore(null, nowEpoch, deps.policy.dispatchBatch);

  const result: DispatchResult = { examined: due.length, claimed: 0, processed: 0, requeued: 0, dropped: 0 };

  for (const { jobId } of due) {
    if (!(await deps.jobs.claim(jobId))) continue;
    result.claimed += 1;

    const payload = await deps.jobs.getPayload(jobId);
    if (!payload) {
      log("info", "reminder.payload_missing", { jobId });
      await finish(deps, jobId, parseReminderJobId(jobId)?.payableId ?? null);
      continue;
    }

    try {
      const outcome = await handleReminder(payload, deps);
      await finish(deps, jobId, payload.payableId);
      result.processed += 1;
      log("info", "reminder.processed", { jobId, ...outcome });
    } catch (err) {
      const attempts = payload.attempts + 1;
      if (attempts > deps.policy.maxRetries) {
        await finish(deps, jobId, payload.payableId);
        result.dropped += 1;
        log("error", "reminder.max_retries", { jobId, attempts, error: errorMessage(err) });
        continue;
      }
      const nextEta = nowEpoch + deps.policy.retryDelaySeconds;
      const ttl = Math.max(
        deps.policy.retryDelaySeconds + deps.policy.retentionAfterEtaSeconds,
        deps.policy.minTtlSeconds
      );
      await deps.jobs.requeue({ ...payload, attempts }, nextEta, ttl);
      result.requeued += 1;
      log("warn", "reminder.requeued", { jobId, attempts, nextEta, error: errorMessage(err) });
    }
  }

  return result;
}
