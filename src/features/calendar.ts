import type { GardenJournal, MowingEvent, WateringEvent, Ymd } from "../types";
import { addDays, daysBetween, eachDay } from "../utils/dates";

export type DayActivity = "watered" | "mowed" | "none";

export interface TimelineDay {
  date: Ymd;
  activity: DayActivity;
}

export interface ActivityStats {
  count: number;
  /** Mean gap between distinct dates, one decimal; null below two dates. */
  meanIntervalDays: number | null;
  lastDate: Ymd | null;
}

export interface MowingStats extends ActivityStats {
  meanHeightCm: number | null;
}

export interface JournalStats {
  watering: ActivityStats;
  mowing: MowingStats;
}

export const DEFAULT_TIMELINE_DAYS = 14;

export function computeActivityStats(events: ReadonlyArray<WateringEvent | MowingEvent>): ActivityStats {
  const dates = [...new Set(events.map((event) => event.date))].sort();
  const lastDate = dates.length ? dates[dates.length - 1] : null;
  let meanIntervalDays: number | null = null;
  if (dates.length >= 2) {
    const span = daysBetween(dates[0], dates[dates.length - 1]);
    meanIntervalDays = roundOne(span / (dates.length - 1));
  }
  return { count: events.length, meanIntervalDays, lastDate };
}

export function computeJournalStats(journal: GardenJournal): JournalStats {
  const heights = journal.mowing.map((event) => event.height_cm);
  const meanHeightCm = heights.length
    ? roundOne(heights.reduce((sum, h) => sum + h, 0) / heights.length)
    : null;
  return {
    watering: computeActivityStats(journal.watering),
    mowing: { ...computeActivityStats(journal.mowing), meanHeightCm },
  };
}

/** One entry per day ending at `today`; a watering outranks a mowing on the same day. */
export function buildActivityTimeline(
  journal: GardenJournal,
  today: Ymd,
  days = DEFAULT_TIMELINE_DAYS,
): TimelineDay[] {
  const span = Math.max(1, Math.round(days));
  const watered = new Set(journal.watering.map((event) => event.date));
  const mowed = new Set(journal.mowing.map((event) => event.date));
  return eachDay(addDays(today, -(span - 1)), today).map((date) => ({
    date,
    activity: watered.has(date) ? "watered" : mowed.has(date) ? "mowed" : "none",
  }));
}

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}
