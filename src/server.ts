// src/server.ts
//
// HTTP entrypoint for the reminders service.
// - schedules payable reminders
// - lists upcoming / windowed / per-payable jobs, optionally hydrated
// - exposes the payables mirror and an on-demand GC sweep

import { createRuntime } from "./bootstrap";
import { loadConfig } from "./config";
import { createApp } from "./http/app";
import { errorMessage, log, setLogLevel } from "./lib/log";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const runtime = await createRuntime(config);
  const app = createApp(runtime.context);

  const server = app.listen(config.port, () => {
    log("info", "server.started", { port: config.port, service: "payable-reminders" });
  });

  async function shutdown(signal: string): Promise<void> {
    log("info", "shutdown requested", { signal });
    server.close();
    try {
      await runtime.close();
      process.exit(0);
    } catch (err) {
      log("error", "shutdown error", { error: errorMessage(err) });
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch(err => {
  log("error", "server failed to start", { error: errorMessage(err) });
  process.exit(1);
});
