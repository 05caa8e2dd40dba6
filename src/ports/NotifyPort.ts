/**
 * NotifyPort
 *
 * Purpose
 * - Single boundary for payable reminder notifications.
 * - The dispatcher calls this port; concrete delivery (email, SMS, etc.)
 *   is hidden behind this interface.
 *
 * Design
 * - Methods are fire-and-forget (Promise<void>) but MUST be idempotent at the
 *   implementation level. A throw makes the dispatcher requeue the job.
 * - Payloads are small, structured, and redactable for logs.
 *
 * Drivers
 * - "noop" (default): logs structured JSON for local runs and tests.
 *
 * Configuration
 * - NOTIFY_DRIVER = "noop"
 */

import { log } from "../lib/log";

/* -----------------------------------------------------------
 * Input shapes
 * --------------------------------------------------------- */

export type ReminderChannel = "email" | "sms";

export interface SendReminderInput {
  payableId: string;
  offsetDays: number;
  when: number;               // unix seconds
  channels: ReminderChannel[];
  subject: string;
  body: string;
  context?: Record<string, unknown>; // businessId, createdBy, etc.
}

/* -----------------------------------------------------------
 * Port interface
 * --------------------------------------------------------- */

export interface NotifyPort {
  sendReminder(input: SendReminderInput): Promise<void>;
}

/* -----------------------------------------------------------
 * Factory
 * --------------------------------------------------------- */

export type NotifyDriver = "noop";

export function getNotifyPort(driver: NotifyDriver = "noop"): NotifyPort {
  switch (driver) {
    case "noop":
      return createNoopNotifier();
  }
}

/* -----------------------------------------------------------
 * Noop driver (development/test)
 * --------------------------------------------------------- */

function createNoopNotifier(): NotifyPort {
  return {
    async sendReminder(input: SendReminderInput): Promise<void> {
      log("info", "sendReminder(noop)", redact(input));
    }
  };
}

/* -----------------------------------------------------------
 * Helpers
 * --------------------------------------------------------- */

/**
 * Redact potentially sensitive context fields before logging.
 * This is intentionally conservative. Expand as needed.
 */
export function redact(input: SendReminderInput): Record<string, unknown> {
  const clone: Record<string, unknown> = { ...input };
  if (input.context) {
    const ctx: Record<string, unknown> = { ...input.context };
    for (const k of Object.keys(ctx)) {
      const lower = k.toLowerCase();
      if (lower.includes("token") || lower.includes("key") || lower.includes("phone") || lower.includes("email")) {
        ctx[k] = "<redacted>";
      }
    }
    clone.context = ctx;
  }
  return clone;
}
