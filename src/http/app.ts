// src/http/app.ts
//
// Express application for the reminders service. Built from a context so
// tests can run it against in-process stores.

import express, { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import type { ReminderContext } from "../context";
import { errorMessage, log } from "../lib/log";
import { remindersRouter } from "./reminders.routes";

export function createApp(ctx: ReminderContext): express.Express {
  const app = express();
  app.use(express.json());

  // Health check: quick ping to see if server is alive
  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "payable-reminders", time: ctx.clock.now().toISOString() });
  });

  app.use(remindersRouter(ctx));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "not found" });
  });

  // Error handler must declare four arguments for Express to treat it as one.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({
        ok: false,
        error: "invalid request",
        issues: err.issues.map(i => ({ path: i.path.join("."), message: i.message }))
      });
      return;
    }
    // body-parser rejects malformed JSON with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: "malformed JSON body" });
      return;
    }
    log("error", "http.unhandled", { method: req.method, path: req.path, error: errorMessage(err) });
    res.status(500).json({ ok: false, error: "internal error" });
  });

  return app;
}
