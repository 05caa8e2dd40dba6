// src/types/reminders.ts

/** One entry of the schedule returned by the scheduler and mirrored onto the payable. */
export interface ScheduledReminder {
  offsetDays: number;
  eta: Date;
  jobId: string;
}

export interface SkippedReminder {
  offsetDays: number;
  eta: Date;
  reason: "eta-in-past";
}

export interface ScheduleResult {
  scheduled: ScheduledReminder[];
  skipped: SkippedReminder[];
}

/**
 * A job as seen by the inspector: the time index entry merged with its payload.
 * Payload fields are null when the payload expired and the id could not fill them in.
 */
export interface InspectedJob {
  jobId: string;
  etaEpoch: number | null;
  etaIso: string | null;
  payableId: string | null;
  offsetDays: number | null;
  attempts: number | null;
}

/** A row read straight from the document-store mirror. */
export interface MirrorJob {
  payableId: string;
  jobId: string | null;
  offsetDays: number | null;
  etaIso: string | null;
}

export const PAYABLE_DISPLAY_FIELDS = [
  "name",
  "reference",
  "currency",
  "status",
  "amount",
  "dueAt",
  "businessId",
  "createdBy"
] as const;

export type PayableField = (typeof PAYABLE_DISPLAY_FIELDS)[number];

/** Decrypted, display-ready slice of a payable attached to a job. */
export interface PayableView {
  payableId: string;
  name: string | null;
  reference: string | null;
  currency: string | null;
  status: string | null;
  amount: string | null;
  dueAt: Date | null;
  businessId: string | null;
  createdBy: string | null;
}

export type Hydrated<T> = T & { payable: PayableView | null };

export interface GcResult {
  examined: number;
  pruned: number;
  cutoff: number;
}
