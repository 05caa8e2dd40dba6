/**
 * Reminder inspector
 *
 * Read-side queries over the job store and the payable mirror, plus a
 * hydration step that attaches decrypted payable fields for display.
 *
 * Availability over strictness: a store error on any of these reads is
 * logged and surfaces as an empty result instead of a throw.
 */

import type { ReminderContext } from "../context";
import { errorMessage, log } from "../lib/log";
import { epochToIso, toEpochSeconds, toUtcDate } from "../lib/time";
import type { JobEntry } from "../ports/JobStore";
import type { PayableRecord } from "../ports/PayableStore";
import { parseReminderJobId, type ReminderJobPayload } from "../types/jobs";
import {
  PAYABLE_DISPLAY_FIELDS,
  type Hydrated,
  type InspectedJob,
  type MirrorJob,
  type PayableField,
  type PayableView
} from "../types/reminders";

type JobsDeps = Pick<ReminderContext, "jobs">;
type MirrorDeps = Pick<ReminderContext, "payables">;
type HydrateDeps = Pick<ReminderContext, "payables" | "cipher">;

export const MIRROR_DOC_LIMIT = 1000;

function inspected(jobId: string, etaEpoch: number | null, payload: ReminderJobPayload | undefined): InspectedJob {
  const fromId = parseReminderJobId(jobId);
  return {
    jobId,
    etaEpoch,
    etaIso: etaEpoch === null ? null : epochToIso(etaEpoch),
    payableId: payload?.payableId ?? fromId?.payableId ?? null,
    offsetDays: payload?.offsetDays ?? fromId?.offsetDays ?? null,
    attempts: payload?.attempts ?? null
  };
}

async function withPayloads(deps: JobsDeps, entries: JobEntry[]): Promise<InspectedJob[]> {
  const payloads = await deps.jobs.getPayloads(entries.map(e => e.jobId));
  return entries.map(e => inspected(e.jobId, e.etaEpoch, payloads.get(e.jobId)));
}

/** Null-last ascending comparison. */
function compareNullable<T extends number | string>(a: T | null, b: T | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** The `limit` soonest jobs with their payloads. */
export async function listNextDue(deps: JobsDeps, limit = 100): Promise<InspectedJob[]> {
  if (limit <= 0) return [];
  try {
    return await withPayloads(deps, await deps.jobs.head(limit));
  } catch (err) {
    log("warn", "reminder.inspect_failed", { op: "listNextDue", error: errorMessage(err) });
    return [];
  }
}

/** Jobs with start <= eta <= end. A null bound is open. */
export async function listJobsWindow(
  deps: JobsDeps,
  start: Date | string | null,
  end: Date | string | null,
  limit = 500
): Promise<InspectedJob[]> {
  // Etas are whole seconds: start rounds up, end rounds down.
  const min = start === null ? null : Math.ceil(toUtcDate(start).getTime() / 1000);
  const max = end === null ? null : toEpochSeconds(toUtcDate(end));
  try {
    return await withPayloads(deps, await deps.jobs.rangeByScore(min, max, limit));
  } catch (err) {
    log("warn", "reminder.inspect_failed", { op: "listJobsWindow", error: errorMessage(err) });
    return [];
  }
}

/**
 * Every job indexed for a payable. Ids that are no longer on the time index
 * are kept with a null eta and sort last.
 */
export async function listJobsForPayable(deps: JobsDeps, payableId: string): Promise<InspectedJob[]> {
  try {
    const members = await deps.jobs.membersForPayable(payableId);
    const payloads = await deps.jobs.getPayloads(members.map(m => m.jobId));
    return members
      .map(m => inspected(m.jobId, m.etaEpoch, payloads.get(m.jobId)))
      .sort((a, b) => compareNullable(a.etaEpoch, b.etaEpoch) || compareNullable(a.jobId, b.jobId));
  } catch (err) {
    log("warn", "reminder.inspect_failed", { op: "listJobsForPayable", payableId, error: errorMessage(err) });
    return [];
  }
}

/**
 * Reads the `scheduled_jobs` mirror straight from the document store.
 * Meant for dashboards and diagnostics; not authoritative if it has diverged
 * from the job store.
 */
export async function listJobsFromMirror(
  deps: MirrorDeps,
  opts: { businessId?: string; limitPerPayable?: number } = {}
): Promise<MirrorJob[]> {
  const limitPerPayable = opts.limitPerPayable ?? 100;
  try {
    const mirrors = await deps.payables.findScheduledMirrors({
      businessId: opts.businessId,
      limit: MIRROR_DOC_LIMIT
    });
    const out: MirrorJob[] = [];
    for (const m of mirrors) {
      for (const j of m.scheduledJobs.slice(0, Math.max(0, limitPerPayable))) {
        out.push({
          payableId: m.payableId,
          jobId: j.jobId,
          offsetDays: j.offsetDays,
          etaIso: j.eta ? j.eta.toISOString() : null
        });
      }
    }
    return out.sort((a, b) => compareNullable(a.etaIso, b.etaIso));
  } catch (err) {
    log("warn", "reminder.inspect_failed", { op: "listJobsFromMirror", error: errorMessage(err) });
    return [];
  }
}

function toView(deps: HydrateDeps, p: PayableRecord): PayableView {
  return {
    payableId: p.id,
    name: deps.cipher.decryptDisplay(p.name),
    reference: deps.cipher.decryptDisplay(p.reference),
    currency: deps.cipher.decryptDisplay(p.currency),
    status: deps.cipher.decryptDisplay(p.status),
    amount: deps.cipher.decryptDisplay(p.amount),
    dueAt: p.dueAt,
    businessId: p.businessId,
    createdBy: p.createdBy
  };
}

/**
 * Attach a decrypted `payable` view to each job. All referenced payables are
 * fetched with one query. Jobs whose payable is gone get `payable: null`.
 */
export async function hydrateJobsWithPayables<T extends { payableId: string | null }>(
  deps: HydrateDeps,
  jobs: readonly T[],
  fields: readonly PayableField[] = PAYABLE_DISPLAY_FIELDS
): Promise<Array<Hydrated<T>>> {
  if (jobs.length === 0) return [];

  const ids = [...new Set(jobs.map(j => j.payableId).filter((id): id is string => !!id))];
  const views = new Map<string, PayableView>();
  if (ids.length > 0) {
    try {
      for (const p of await deps.payables.findPayables(ids, fields)) {
        views.set(p.id, toView(deps, p));
      }
    } catch (err) {
      log("warn", "reminder.inspect_failed", { op: "hydrateJobsWithPayables", error: errorMessage(err) });
    }
  }

  return jobs.map(j => ({ ...j, payable: (j.payableId && views.get(j.payableId)) || null }));
}
