/**
 * Service configuration.
 *
 * Environment
 * - REDIS_URL                          redis connection string (job store + BullMQ)
 * - MONGO_URL                          mongodb connection string (payables)
 * - MONGO_DB                           database name, default "app"
 * - SECRET_KEY                         field encryption passphrase, first 32 bytes are the AES key
 * - PORT                               HTTP port, default 3000
 * - LOG_LEVEL                          debug, info, warn, error
 * - WORKER_CONCURRENCY                 maintenance worker concurrency, default 1
 * - REMINDER_RETENTION_AFTER_ETA_SEC   payload kept this long past its eta, default 3600
 * - REMINDER_MIN_TTL_SEC               lower bound for payload TTL, default 60
 * - REMINDER_GC_GRACE_SEC              GC prunes jobs older than now minus this, default 3600
 * - REMINDER_GC_MAX_PER_RUN            GC batch cap, default 2000
 * - REMINDER_GC_EVERY_MS               GC repeat interval, default 60000
 * - REMINDER_DISPATCH_EVERY_MS         due-job dispatch repeat interval, default 5000
 * - REMINDER_DISPATCH_BATCH            max jobs claimed per dispatch run, default 50
 * - REMINDER_RETRY_DELAY_SEC           delay before a failed reminder is retried, default 300
 * - REMINDER_MAX_RETRIES               attempts before a reminder is dropped, default 12
 * - NOTIFY_DRIVER                      "noop" (default)
 */

import { z } from "zod";

const PositiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  REDIS_URL: z.string().min(1, "REDIS_URL is required"),
  MONGO_URL: z.string().min(1, "MONGO_URL is required"),
  MONGO_DB: z.string().min(1).default("app"),
  SECRET_KEY: z.string().min(32, "SECRET_KEY must be at least 32 characters"),
  PORT: PositiveInt.default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  WORKER_CONCURRENCY: PositiveInt.default(1),
  REMINDER_RETENTION_AFTER_ETA_SEC: PositiveInt.default(3600),
  REMINDER_MIN_TTL_SEC: PositiveInt.default(60),
  REMINDER_GC_GRACE_SEC: PositiveInt.default(3600),
  REMINDER_GC_MAX_PER_RUN: PositiveInt.default(2000),
  REMINDER_GC_EVERY_MS: PositiveInt.default(60_000),
  REMINDER_DISPATCH_EVERY_MS: PositiveInt.default(5_000),
  REMINDER_DISPATCH_BATCH: PositiveInt.default(50),
  REMINDER_RETRY_DELAY_SEC: PositiveInt.default(300),
  REMINDER_MAX_RETRIES: PositiveInt.default(12),
  NOTIFY_DRIVER: z.enum(["noop"]).default("noop")
});

/** Timing knobs shared by the scheduler, GC and dispatcher. */
export interface ReminderPolicy {
  retentionAfterEtaSeconds: number;
  minTtlSeconds: number;
  gcGraceSeconds: number;
  gcMaxPerRun: number;
  dispatchBatch: number;
  retryDelaySeconds: number;
  maxRetries: number;
}

export const DEFAULT_REMINDER_POLICY: ReminderPolicy = {
  retentionAfterEtaSeconds: 3600,
  minTtlSeconds: 60,
  gcGraceSeconds: 3600,
  gcMaxPerRun: 2000,
  dispatchBatch: 50,
  retryDelaySeconds: 300,
  maxRetries: 12
};

export interface AppConfig {
  redisUrl: string;
  mongoUrl: string;
  mongoDb: string;
  secretKey: string;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  workerConcurrency: number;
  gcEveryMs: number;
  dispatchEveryMs: number;
  notifyDriver: "noop";
  policy: ReminderPolicy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  return {
    redisUrl: e.REDIS_URL,
    mongoUrl: e.MONGO_URL,
    mongoDb: e.MONGO_DB,
    secretKey: e.SECRET_KEY,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    workerConcurrency: e.WORKER_CONCURRENCY,
    gcEveryMs: e.REMINDER_GC_EVERY_MS,
    dispatchEveryMs: e.REMINDER_DISPATCH_EVERY_MS,
    notifyDriver: e.NOTIFY_DRIVER,
    policy: {
      retentionAfterEtaSeconds: e.REMINDER_RETENTION_AFTER_ETA_SEC,
      minTtlSeconds: e.REMINDER_MIN_TTL_SEC,
      gcGraceSeconds: e.REMINDER_GC_GRACE_SEC,
      gcMaxPerRun: e.REMINDER_GC_MAX_PER_RUN,
      dispatchBatch: e.REMINDER_DISPATCH_BATCH,
      retryDelaySeconds: e.REMINDER_RETRY_DELAY_SEC,
      maxRetries: e.REMINDER_MAX_RETRIES
    }
  };
}
