/**
 * Reminder job definitions.
 *
 * Why this file exists
 * - Single source of truth for the reminder payload stored beside each job.
 * - Enforce invariants with Zod so the inspector and dispatcher can trust stored data.
 * - Offer helpers to compute and reverse the deterministic job id.
 *
 * Design principles
 * - Pure and deterministic: no IO, no global state.
 * - Unix timestamps in seconds. All numeric fields are integers.
 */

import { z } from "zod";

/* -----------------------------------------------------------
 * Common primitives
 * --------------------------------------------------------- */

export const UnixSeconds = z
  .number()
  .int()
  .nonnegative("must be a unix timestamp in seconds");

export const NonNegativeInt = z
  .number()
  .int()
  .nonnegative("must be a non negative integer");

/* -----------------------------------------------------------
 * Reminder jobs
 * --------------------------------------------------------- */

export const ReminderJobPayloadSchema = z.object({
  jobId: z.string().min(1, "jobId is required"),
  payableId: z.string().min(1, "payableId is required"),
  offsetDays: z.number().int(),
  etaEpoch: UnixSeconds,
  attempts: NonNegativeInt
});

export type ReminderJobPayload = z.infer<typeof ReminderJobPayloadSchema>;

/**
 * Build the deterministic id of a reminder job.
 * Key format: payable:<payableId>:off:<offsetDays>:at:<etaEpoch>
 *
 * Re-scheduling the same (payable, offset, eta) yields the same id, which is
 * what keeps scheduling idempotent.
 */
export function jobIdForReminder(payableId: string, offsetDays: number, etaEpoch: number): string {
  return `payable:${payableId}:off:${offsetDays}:at:${etaEpoch}`;
}

export interface ParsedReminderJobId {
  payableId: string;
  offsetDays: number;
  etaEpoch: number;
}

const JOB_ID_PATTERN = /^payable:(.+):off:(-?\d+):at:(\d+)$/;

/**
 * Reverse of jobIdForReminder. Returns null for ids that do not follow the format.
 * The garbage collector relies on this to find the owning payable.
 */
export function parseReminderJobId(jobId: string): ParsedReminderJobId | null {
  const m = JOB_ID_PATTERN.exec(jobId);
  if (!m) return null;
  return {
    payableId: m[1],
    offsetDays: Number(m[2]),
    etaEpoch: Number(m[3])
  };
}

/** Build a fresh payload for a newly scheduled reminder. */
export function newReminderPayload(payableId: string, offsetDays: number, etaEpoch: number): ReminderJobPayload {
  return {
    jobId: jobIdForReminder(payableId, offsetDays, etaEpoch),
    payableId,
    offsetDays,
    etaEpoch,
    attempts: 0
  };
}

/* -----------------------------------------------------------
 * Runtime validators
 * --------------------------------------------------------- */

export function assertReminderJobPayload(input: unknown): ReminderJobPayload {
  return ReminderJobPayloadSchema.parse(input);
}

/** Parse a stored JSON payload. Malformed or invalid payloads read as null. */
export function parseStoredPayload(raw: string | null): ReminderJobPayload | null {
  if (!raw) return null;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ReminderJobPayloadSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
