// src/lib/time.ts
//
// UTC helpers. Unix timestamps are whole seconds; Dates are instants.

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

/** A clock pinned to one instant. Handy for maintenance runs and tests. */
export function fixedClock(at: Date | string): Clock {
  const instant = toUtcDate(at);
  return { now: () => new Date(instant.getTime()) };
}

// ISO strings with "Z" or a "+hh:mm" / "-hhmm" suffix carry their own zone.
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalise a timestamp to a UTC instant.
 * Strings without a zone designator are read as UTC, not as host-local time.
 * Numbers are epoch milliseconds.
 */
export function toUtcDate(value: Date | string | number): Date {
  let d: Date;
  if (value instanceof Date) {
    d = new Date(value.getTime());
  } else if (typeof value === "number") {
    d = new Date(value);
  } else {
    const s = value.trim();
    const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(s);
    d = new Date(dateOnly || HAS_ZONE.test(s) ? s : `${s}Z`);
  }
  if (Number.isNaN(d.getTime())) {
    throw new Error(`invalid timestamp: ${String(value)}`);
  }
  return d;
}

export function toEpochSeconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}

export function fromEpochSeconds(sec: number): Date {
  return new Date(sec * 1000);
}

export function epochToIso(sec: number): string {
  return fromEpochSeconds(sec).toISOString();
}

/** Subtract whole UTC calendar days, keeping the time of day. */
export function subtractCalendarDays(d: Date, days: number): Date {
  const out = new Date(d.getTime());
  out.setUTCDate(out.getUTCDate() - days);
  return out;
}
