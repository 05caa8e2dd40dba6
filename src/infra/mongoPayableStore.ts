// src/infra/mongoPayableStore.ts
//
// MongoDB backed PayableStore over the `payables` collection.
//
// Document fields read or written here:
//   _id, business_id, created_by          ObjectId
//   name, reference, currency, status,    encrypted strings
//   amount
//   due_at, updated_at                    Date
//   scheduled_jobs                        [{ offset_days, eta, job_id }]
//   reminders                             [{ offset_days, scheduled_for, sent_at, channels, success }]

import { ObjectId, type Collection, type Document, type Filter } from "mongodb";
import { log } from "../lib/log";
import type {
  FindMirrorsQuery,
  MirrorEntry,
  PayableMirror,
  PayableRecord,
  PayableStore,
  ReminderRecord
} from "../ports/PayableStore";
import type { PayableField, ScheduledReminder } from "../types/reminders";

export const PAYABLES_COLLECTION = "payables";

const FIELD_TO_DOC: Record<PayableField, string> = {
  name: "name",
  reference: "reference",
  currency: "currency",
  status: "status",
  amount: "amount",
  dueAt: "due_at",
  businessId: "business_id",
  createdBy: "created_by"
};

export function toObjectId(id: string): ObjectId | null {
  return ObjectId.isValid(id) ? new ObjectId(id) : null;
}

function str(v: unknown): string | null {
  return typeof v === "string" && v !== "" ? v : null;
}

function date(v: unknown): Date | null {
  return v instanceof Date ? v : null;
}

function num(v: unknown): number | null {
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function idString(v: unknown): string | null {
  if (v instanceof ObjectId) return v.toHexString();
  return str(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function mirrorEntry(r: unknown): MirrorEntry {
  if (!isRecord(r)) {
    return { jobId: null, offsetDays: null, eta: null };
  }
  return {
    jobId: str(r.job_id),
    offsetDays: num(r.offset_days),
    eta: date(r.eta)
  };
}

function toRecord(doc: Document): PayableRecord {
  const reminders: unknown[] = Array.isArray(doc.reminders) ? doc.reminders : [];
  return {
    id: idString(doc._id) ?? "",
    name: str(doc.name),
    reference: str(doc.reference),
    currency: str(doc.currency),
    status: str(doc.status),
    amount: str(doc.amount),
    dueAt: date(doc.due_at),
    businessId: idString(doc.business_id),
    createdBy: idString(doc.created_by),
    reminders: reminders.map(r => ({ offsetDays: isRecord(r) ? num(r.offset_days) : null }))
  };
}

export class MongoPayableStore implements PayableStore {
  constructor(private readonly col: Collection<Document>) {}

  async replaceScheduledJobs(payableId: string, jobs: readonly ScheduledReminder[], now: Date): Promise<void> {
    const _id = toObjectId(payableId);
    if (!_id) {
      log("warn", "payables.invalid_id", { op: "replaceScheduledJobs", payableId });
      return;
    }
    await this.col.updateOne(
      { _id },
      {
        $set: {
          scheduled_jobs: jobs.map(j => ({ offset_days: j.offsetDays, eta: j.eta, job_id: j.jobId })),
          updated_at: now
        }
      }
    );
  }

  async pullScheduledJobs(payableId: string, jobIds: readonly string[]): Promise<void> {
    const _id = toObjectId(payableId);
    if (!_id) {
      log("warn", "payables.invalid_id", { op: "pullScheduledJobs", payableId });
      return;
    }
    if (jobIds.length === 0) return;
    await this.col.updateOne(
      { _id },
      { $pull: { scheduled_jobs: { job_id: { $in: [...jobIds] } } } }
    );
  }

  async findScheduledMirrors(query: FindMirrorsQuery): Promise<PayableMirror[]> {
    const filter: Filter<Document> = { scheduled_jobs: { $exists: true, $ne: [] } };
    if (query.businessId !== undefined) {
      const businessId = toObjectId(query.businessId);
      if (!businessId) {
        log("warn", "payables.invalid_id", { op: "findScheduledMirrors", businessId: query.businessId });
        return [];
      }
      filter.business_id = businessId;
    }
    const docs = await this.col
      .find(filter, { projection: { scheduled_jobs: 1 } })
      .limit(query.limit)
      .toArray();
    return docs.map(doc => {
      const entries: unknown[] = Array.isArray(doc.scheduled_jobs) ? doc.scheduled_jobs : [];
      return {
        payableId: idString(doc._id) ?? "",
        scheduledJobs: entries.map(mirrorEntry)
      };
    });
  }

  async findPayables(ids: readonly string[], fields: readonly PayableField[]): Promise<PayableRecord[]> {
    const objectIds: ObjectId[] = [];
    for (const id of ids) {
      const oid = toObjectId(id);
      if (oid) objectIds.push(oid);
      else log("debug", "payables.invalid_id", { op: "findPayables", payableId: id });
    }
    if (objectIds.length === 0) return [];
    const projection: Record<string, 1> = {};
    for (const f of fields) projection[FIELD_TO_DOC[f]] = 1;
    const docs = await this.col.find({ _id: { $in: objectIds } }, { projection }).toArray();
    return docs.map(toRecord);
  }

  async findPayable(id: string): Promise<PayableRecord | null> {
    const _id = toObjectId(id);
    if (!_id) {
      log("warn", "payables.invalid_id", { op: "findPayable", payableId: id });
      return null;
    }
    const doc = await this.col.findOne({ _id });
    return doc ? toRecord(doc) : null;
  }

  async recordReminderSent(id: string, record: ReminderRecord, encryptedStatus: string, now: Date): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) {
      log("warn", "payables.invalid_id", { op: "recordReminderSent", payableId: id });
      return;
    }
    await this.col.updateOne(
      { _id },
      {
        $push: {
          reminders: {
            offset_days: record.offsetDays,
            scheduled_for: record.scheduledFor,
            sent_at: record.sentAt,
            channels: record.channels,
            success: record.success
          }
        },
        $set: { status: encryptedStatus, updated_at: now }
      }
    );
  }
}
