// src/context.ts
//
// Collaborators shared by services, processors and the HTTP layer.
// Each function takes only the slice it needs (Pick<ReminderContext, ...>)
// so tests can pass small fakes.

import type { ReminderPolicy } from "./config";
import type { FieldCipher } from "./infra/fieldCipher";
import type { Clock } from "./lib/time";
import type { JobStore } from "./ports/JobStore";
import type { NotifyPort } from "./ports/NotifyPort";
import type { PayableStore } from "./ports/PayableStore";

export interface ReminderContext {
  jobs: JobStore;
  payables: PayableStore;
  notify: NotifyPort;
  cipher: FieldCipher;
  clock: Clock;
  policy: ReminderPolicy;
}
