import type { Ymd } from "../types";

export function todayYMD(): Ymd {
  return formatYMD(new Date());
}

export function addDays(ymd: Ymd, days: number): Ymd {
  const [y, m, d] = ymd.split("-").map(Number);
  const dt = new Date(y, m - 1, d);
  dt.setDate(dt.getDate() + days);
  return formatYMD(dt);
}

export function parseYMD(ymd: string | undefined | null): Date | null {
  if (!ymd || !/^\d{4}-\d{2}-\d{2}$/.test(ymd)) return null;
  const [y, m, d] = ymd.split("-").map((part) => Number(part));
  const dt = new Date(y, m - 1, d);
  if (Number.isNaN(dt.getTime())) {
    return null;
  }
  // Date rolls 2024-02-30 over to March; reject instead.
  if (dt.getFullYear() !== y || dt.getMonth() !== m - 1 || dt.getDate() !== d) {
    return null;
  }
  return dt;
}

export function isYMD(value: unknown): value is Ymd {
  return typeof value === "string" && parseYMD(value) !== null;
}

/**
 * Accepts `YYYY-MM-DD` or an ISO datetime and keeps the calendar day as written.
 * Anything else yields null.
 */
export function coerceYMD(value: unknown): Ymd | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatYMD(value);
  }
  if (typeof value !== "string") return null;
  const match = /^(\d{4}-\d{2}-\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/.exec(value.trim());
  if (!match) return null;
  return isYMD(match[1]) ? match[1] : null;
}

export function formatYMD(date: Date): Ymd {
  const yy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yy}-${mm}-${dd}`;
}

export function differenceInDays(a: Date, b: Date): number {
  const diff = a.getTime() - b.getTime();
  return Math.round(diff / (1000 * 60 * 60 * 24));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: Ymd, to: Ymd): number {
  const a = parseYMD(from);
  const b = parseYMD(to);
  if (!a || !b) return 0;
  return differenceInDays(b, a);
}

/** Every calendar day from `start` to `end`, both included. */
export function eachDay(start: Ymd, end: Ymd): Ymd[] {
  const days: Ymd[] = [];
  let cursor = start;
  while (cursor <= end) {
    days.push(cursor);
    cursor = addDays(cursor, 1);
  }
  return days;
}
