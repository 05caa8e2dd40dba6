// src/processors/runMaintenanceJob.ts
//
// Routes a maintenance queue job to its chore. Kept free of BullMQ types so
// the worker stays a thin adapter.

import type { ReminderContext } from "../context";
import { JOB_DISPATCH_DUE, JOB_PRUNE_EXPIRED, isMaintenanceJobName } from "../queues/maintenance.queue";
import { pruneExpiredJobsByEta } from "../services/reminderGc";
import type { GcResult } from "../types/reminders";
import { dispatchDueReminders, type DispatchResult } from "./dispatchDueReminders";

export type MaintenanceResult =
  | { job: typeof JOB_DISPATCH_DUE; result: DispatchResult }
  | { job: typeof JOB_PRUNE_EXPIRED; result: GcResult };

export async function runMaintenanceJob(name: string, deps: ReminderContext): Promise<MaintenanceResult> {
  if (!isMaintenanceJobName(name)) {
    throw new Error(`unknown maintenance job: ${name}`);
  }
  switch (name) {
    case JOB_DISPATCH_DUE:
      return { job: name, result: await dispatchDueReminders(deps) };
    case JOB_PRUNE_EXPIRED:
      return { job: name, result: await pruneExpiredJobsByEta(deps, deps.policy.gcMaxPerRun) };
  }
}
