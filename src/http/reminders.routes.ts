// src/http/reminders.routes.ts
//
// Reminder endpoints. Framework glue only: validate with Zod, call the
// service, map the result to JSON.
//
// - POST /payables/:payableId/reminders   schedule reminders for a payable
// - GET  /payables/:payableId/reminders   jobs indexed for a payable
// - GET  /reminders/next-due              soonest jobs
// - GET  /reminders/window                jobs with eta in [start, end]
// - GET  /reminders/mirror                schedule mirror read from the payables collection
// - POST /reminders/gc                    one garbage-collection sweep

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";
import type { ReminderContext } from "../context";
import {
  hydrateJobsWithPayables,
  listJobsForPayable,
  listJobsFromMirror,
  listJobsWindow,
  listNextDue
} from "../services/reminderInspector";
import { pruneExpiredJobsByEta } from "../services/reminderGc";
import { scheduleReminderJobs } from "../services/reminderScheduler";
import type { InspectedJob } from "../types/reminders";

/* -----------------------------------------------------------
 * Request schemas
 * --------------------------------------------------------- */

const Timestamp = z
  .string()
  .min(1)
  .refine(s => !Number.isNaN(Date.parse(s)), "must be an ISO-8601 timestamp");

export const ScheduleBodySchema = z.object({
  dueAt: Timestamp,
  offsetsDays: z.array(z.number().int()).max(366)
});

const Flag = z
  .enum(["1", "0", "true", "false"])
  .optional()
  .transform(v => v === "1" || v === "true");

const Limit = (fallback: number) => z.coerce.number().int().positive().max(5000).default(fallback);

const NextDueQuerySchema = z.object({ limit: Limit(100), hydrate: Flag });

const WindowQuerySchema = z.object({
  start: Timestamp.optional(),
  end: Timestamp.optional(),
  limit: Limit(500),
  hydrate: Flag
});

const PayableQuerySchema = z.object({ hydrate: Flag });

const MirrorQuerySchema = z.object({
  businessId: z.string().min(1).optional(),
  limitPerPayable: Limit(100)
});

const GcBodySchema = z.object({
  maxToPrune: z.number().int().positive().max(10_000).optional()
});

/* -----------------------------------------------------------
 * Helpers
 * --------------------------------------------------------- */

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises to the error handler on its own. */
function route(fn: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

async function maybeHydrate(ctx: ReminderContext, jobs: InspectedJob[], hydrate: boolean) {
  return hydrate ? hydrateJobsWithPayables(ctx, jobs) : jobs;
}

/* -----------------------------------------------------------
 * Router
 * --------------------------------------------------------- */

export function remindersRouter(ctx: ReminderContext): Router {
  const r = Router();

  r.post(
    "/payables/:payableId/reminders",
    route(async (req, res) => {
      const body = ScheduleBodySchema.parse(req.body);
      const result = await scheduleReminderJobs(ctx, req.params.payableId, body.dueAt, body.offsetsDays);
      res.status(result.scheduled.length > 0 ? 201 : 200).json({ ok: true, ...result });
    })
  );

  r.get(
    "/payables/:payableId/reminders",
    route(async (req, res) => {
      const q = PayableQuerySchema.parse(req.query);
      const jobs = await listJobsForPayable(ctx, req.params.payableId);
      res.json({ ok: true, jobs: await maybeHydrate(ctx, jobs, q.hydrate) });
    })
  );

  r.get(
    "/reminders/next-due",
    route(async (req, res) => {
      const q = NextDueQuerySchema.parse(req.query);
      const jobs = await listNextDue(ctx, q.limit);
      res.json({ ok: true, jobs: await maybeHydrate(ctx, jobs, q.hydrate) });
    })
  );

  r.get(
    "/reminders/window",
    route(async (req, res) => {
      const q = WindowQuerySchema.parse(req.query);
      const jobs = await listJobsWindow(ctx, q.start ?? null, q.end ?? null, q.limit);
      res.json({ ok: true, jobs: await maybeHydrate(ctx, jobs, q.hydrate) });
    })
  );

  r.get(
    "/reminders/mirror",
    route(async (req, res) => {
      const q = MirrorQuerySchema.parse(req.query);
      const jobs = await listJobsFromMirror(ctx, q);
      res.json({ ok: true, jobs });
    })
  );

  r.post(
    "/reminders/gc",
    route(async (req, res) => {
      const body = GcBodySchema.parse(req.body ?? {});
      const result = await pruneExpiredJobsByEta(ctx, body.maxToPrune ?? ctx.policy.gcMaxPerRun);
      res.json({ ok: true, ...result });
    })
  );

  return r;
}
