// src/lib/log.ts
//
// Leveled JSON-lines logger shared by the server, the worker and services.
// One line per entry: { level, msg, ts, ...meta }.

export type Level = "debug" | "info" | "warn" | "error";

const ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(value: string | undefined): value is Level {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const envLevel = process.env.LOG_LEVEL;
let threshold: Level = isLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: Level): void {
  threshold = level;
}

export function log(level: Level, msg: string, meta: Record<string, unknown> = {}): void {
  if (ORDER[level] < ORDER[threshold]) return;
  const entry = { level, msg, ts: new Date().toISOString(), ...meta };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(entry));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
