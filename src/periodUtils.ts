import type { WorkPeriod } from "./types";

export type PeriodsCheck =
  | { ok: true; periods: WorkPeriod[] }
  | { ok: false; reason: string };

export function isOpen(period: WorkPeriod | undefined | null): boolean {
  return !!period && period.end === null;
}

export function lastPeriod(periods: readonly WorkPeriod[]): WorkPeriod | undefined {
  return periods.length > 0 ? periods[periods.length - 1] : undefined;
}

export function findOpenPeriod(
  periods: readonly WorkPeriod[]
): WorkPeriod | undefined {
  const last = lastPeriod(periods);
  return last && isOpen(last) ? last : undefined;
}

// Local time as HH:MM dd.mm.yy
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  const pad = (value: number) => `${value}`.padStart(2, "0");
  const hh = pad(date.getHours());
  const mm = pad(date.getMinutes());
  const dd = pad(date.getDate());
  const mo = pad(date.getMonth() + 1);
  const yy = pad(date.getFullYear() % 100);
  return `${hh}:${mm} ${dd}.${mo}.${yy}`;
}

export function formatPeriodLine(period: WorkPeriod): string {
  return `${period.start}..${period.end ?? "(in progress)"}`;
}

// Only the canonical Date#toISOString form is accepted
function isTimestamp(value: unknown): value is string {
  return (
    typeof value === "string" &&
    !Number.isNaN(Date.parse(value)) &&
    new Date(value).toISOString() === value
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks a decoded `periods` value against the data model: well-formed
 * timestamps, chronological order, and at most one open period which must be
 * the last one.
 */
export function checkPeriods(value: unknown): PeriodsCheck {
  if (!Array.isArray(value)) {
    return { ok: false, reason: "periods is not a list" };
  }

  const periods: WorkPeriod[] = [];
  let previousEnd = -Infinity;
  for (const [index, raw] of value.entries()) {
    if (!isRecord(raw)) {
      return { ok: false, reason: `period ${index} is not an object` };
    }
    const rawStart = raw.start;
    if (!isTimestamp(rawStart)) {
      return { ok: false, reason: `period ${index} has an invalid start` };
    }
    const start = Date.parse(rawStart);
    const rawEnd = raw.end ?? null;
    let end: string | null = null;
    if (rawEnd !== null) {
      if (!isTimestamp(rawEnd)) {
        return { ok: false, reason: `period ${index} has an invalid end` };
      }
      if (Date.parse(rawEnd) < start) {
        return { ok: false, reason: `period ${index} ends before it starts` };
      }
      end = rawEnd;
    } else if (index !== value.length - 1) {
      return {
        ok: false,
        reason: `period ${index} is still open but is not the latest`,
      };
    }
    if (start < previousEnd) {
      return {
        ok: false,
        reason: `period ${index} starts before the previous one ended`,
      };
    }
    previousEnd = end === null ? start : Date.parse(end);
    periods.push({ start: rawStart, end });
  }

  return { ok: true, periods };
}
