/**
 * Reminder maintenance worker entry point.
 *
 * Purpose
 * - Register the repeatable maintenance jobs (dispatch-due, prune-expired).
 * - Consume the maintenance queue and run the matching chore against the
 *   job store and the payables collection.
 * - Provide predictable lifecycle hooks and graceful shutdown.
 *
 * Environment
 * - see src/config.ts
 *
 * Design
 * - Chores are plain async functions in src/processors; this file only wires
 *   BullMQ to them and logs queue events.
 * - Idempotency is handled by the chores themselves (ZREM claims, idempotent
 *   deletes), so overlapping ticks are harmless.
 */

import { QueueEvents, Worker } from "bullmq";
import { createRuntime } from "./bootstrap";
import { loadConfig } from "./config";
import { errorMessage, log, setLogLevel } from "./lib/log";
import { runMaintenanceJob } from "./processors/runMaintenanceJob";
import { Q_MAINTENANCE, createMaintenanceQueue, registerMaintenanceJobs } from "./queues/maintenance.queue";

function wireQueueEvents(name: string, events: QueueEvents): void {
  events.on("completed", ({ jobId, returnvalue }) => {
    log("debug", "job completed", { queue: name, jobId, returnvalue });
  });
  events.on("failed", ({ jobId, failedReason }) => {
    log("warn", "job failed", { queue: name, jobId, failedReason });
  });
  events.on("stalled", ({ jobId }) => log("warn", "job stalled", { queue: name, jobId }));
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const runtime = await createRuntime(config);
  const connection = runtime.redis;

  const queue = createMaintenanceQueue(connection);
  await registerMaintenanceJobs(queue, {
    dispatchEveryMs: config.dispatchEveryMs,
    gcEveryMs: config.gcEveryMs
  });

  const events = new QueueEvents(Q_MAINTENANCE, { connection: connection.duplicate() });
  wireQueueEvents(Q_MAINTENANCE, events);

  const worker = new Worker(
    Q_MAINTENANCE,
    async job => {
      const started = Date.now();
      try {
        const res = await runMaintenanceJob(job.name, runtime.context);
        log("info", "processed job", { queue: Q_MAINTENANCE, job: job.name, ms: Date.now() - started, ...res.result });
        return res;
      } catch (err) {
        log("error", "processor threw", {
          queue: Q_MAINTENANCE,
          job: job.name,
          ms: Date.now() - started,
          error: errorMessage(err)
        });
        throw err;
      }
    },
    { connection: connection.duplicate(), concurrency: config.workerConcurrency }
  );

  async function shutdown(signal: string): Promise<void> {
    log("info", "shutdown requested", { signal });
    try {
      await Promise.all([worker.close(), events.close(), queue.close()]);
      await runtime.close();
      log("info", "shutdown complete");
      process.exit(0);
    } catch (err) {
      log("error", "shutdown error", { error: errorMessage(err) });
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  log("info", "reminder worker online", {
    redis: new URL(config.redisUrl).host,
    concurrency: config.workerConcurrency,
    dispatchEveryMs: config.dispatchEveryMs,
    gcEveryMs: config.gcEveryMs
  });
}

main().catch(err => {
  log("error", "worker failed to start", { error: errorMessage(err) });
  process.exit(1);
});
