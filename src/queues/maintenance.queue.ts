/**
 * Reminder maintenance queue
 *
 * Purpose
 * - Drive the two periodic reminder chores through BullMQ repeatable jobs:
 *     dispatch-due    drain reminders whose eta has passed
 *     prune-expired   garbage-collect jobs past their eta + grace window
 * - Use fixed job ids so restarts and multiple producers do not stack
 *   duplicate schedules.
 *
 * Notes
 * - The reminder jobs themselves live in the sorted-set job store, not in
 *   BullMQ. BullMQ only provides the clock tick and a worker with retries.
 * - Keep remove-on-* windows small so Redis doesn’t balloon.
 */

import { Queue, type ConnectionOptions, type JobsOptions } from "bullmq";

export const Q_MAINTENANCE = "reminder-maintenance";

export const JOB_DISPATCH_DUE = "dispatch-due";
export const JOB_PRUNE_EXPIRED = "prune-expired";

export type MaintenanceJobName = typeof JOB_DISPATCH_DUE | typeof JOB_PRUNE_EXPIRED;

export function isMaintenanceJobName(name: string): name is MaintenanceJobName {
  return name === JOB_DISPATCH_DUE || name === JOB_PRUNE_EXPIRED;
}

export const defaultJobOptions: JobsOptions = {
  removeOnComplete: { age: 60 * 60, count: 100 },  // keep for 1h or last 100
  removeOnFail: { age: 24 * 60 * 60, count: 1000 }, // keep for 24h
  attempts: 1
};

export interface MaintenanceSchedule {
  dispatchEveryMs: number;
  gcEveryMs: number;
}

export function createMaintenanceQueue(connection: ConnectionOptions): Queue {
  return new Queue(Q_MAINTENANCE, { connection, defaultJobOptions });
}

/**
 * Register (or re-register) both repeatable jobs.
 * Safe to call on every worker start.
 */
export async function registerMaintenanceJobs(queue: Queue, schedule: MaintenanceSchedule): Promise<void> {
  await queue.add(JOB_DISPATCH_DUE, {}, {
    jobId: `${Q_MAINTENANCE}:${JOB_DISPATCH_DUE}`,
    repeat: { every: schedule.dispatchEveryMs }
  });
  await queue.add(JOB_PRUNE_EXPIRED, {}, {
    jobId: `${Q_MAINTENANCE}:${JOB_PRUNE_EXPIRED}`,
    repeat: { every: schedule.gcEveryMs }
  });
}
