/**
 * PayableStore
 *
 * Purpose
 * - Narrow boundary to the document store holding payables.
 * - Carries the denormalised `scheduled_jobs` mirror (informational only;
 *   the JobStore is authoritative) and the reminder history written by the
 *   dispatcher.
 *
 * Notes
 * - Display fields (name, reference, currency, status, amount) are stored
 *   encrypted; this port returns them as stored. Decryption happens in services.
 * - Implementations ignore ids they cannot address (logged), they do not throw on them.
 *
 * Implementations
 * - infra/mongoPayableStore.ts (mongodb)
 */

import type { PayableField, ScheduledReminder } from "../types/reminders";

export interface MirrorEntry {
  jobId: string | null;
  offsetDays: number | null;
  eta: Date | null;
}

export interface PayableMirror {
  payableId: string;
  scheduledJobs: MirrorEntry[];
}

export interface ReminderRecord {
  offsetDays: number;
  scheduledFor: Date | null;
  sentAt: Date;
  channels: string[];
  success: boolean;
}

/** A payable as stored. Encrypted fields are still ciphertext. */
export interface PayableRecord {
  id: string;
  name: string | null;
  reference: string | null;
  currency: string | null;
  status: string | null;
  amount: string | null;
  dueAt: Date | null;
  businessId: string | null;
  createdBy: string | null;
  reminders: Array<{ offsetDays: number | null }>;
}

export interface FindMirrorsQuery {
  businessId?: string;
  /** Max payable documents read. */
  limit: number;
}

export interface PayableStore {
  /** Full replace of the mirror and bump updated_at. */
  replaceScheduledJobs(payableId: string, jobs: readonly ScheduledReminder[], now: Date): Promise<void>;

  /** Pull every mirror entry whose job id is in `jobIds`. */
  pullScheduledJobs(payableId: string, jobIds: readonly string[]): Promise<void>;

  /** Payables whose mirror is non-empty, optionally scoped to a business. */
  findScheduledMirrors(query: FindMirrorsQuery): Promise<PayableMirror[]>;

  /** One query for all ids. Unknown ids are simply absent from the result. */
  findPayables(ids: readonly string[], fields: readonly PayableField[]): Promise<PayableRecord[]>;

  findPayable(id: string): Promise<PayableRecord | null>;

  /** Append to the reminder history and set the (already encrypted) status. */
  recordReminderSent(id: string, record: ReminderRecord, encryptedStatus: string, now: Date): Promise<void>;
}
