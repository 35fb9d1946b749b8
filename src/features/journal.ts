import type { GardenJournal, MowingEvent, WateringEvent, Ymd } from "../types";
import { coerceNumber } from "../settings";
import { coerceYMD, isYMD } from "../utils/dates";

/**
 * Shapes a journal entry can take on disk. Older files store watering as bare
 * dates (every tracked plant watered) and may hold a list of dates on a mowing
 * entry; both are folded into WateringEvent / MowingEvent here.
 */
export type RawWateringEntry =
  | { kind: "bare-date"; date: Ymd }
  | { kind: "record"; date: Ymd; plants: string[] | null };

export interface RawMowingEntry {
  kind: "record";
  date: Ymd;
  height_cm: number | null;
}

export interface JournalNormaliseOptions {
  /** Plants credited by entries that do not name any. */
  defaultPlants: string[];
  defaultCutHeightCm: number;
}

export interface NormalisedJournal {
  journal: GardenJournal;
  warnings: string[];
}

export function createEmptyJournal(): GardenJournal {
  return { watering: [], mowing: [] };
}

export function readWateringEntry(entry: unknown): RawWateringEntry | null {
  const bare = coerceYMD(entry);
  if (bare) return { kind: "bare-date", date: bare };
  if (!isRecord(entry)) return null;
  const date = coerceYMD(entry.date);
  if (!date) return null;
  const plants = Array.isArray(entry.plants)
    ? entry.plants
        .filter((p): p is string => typeof p === "string")
        .map((p) => p.trim())
        .filter((p) => p.length > 0)
    : null;
  return { kind: "record", date, plants: plants && plants.length ? plants : null };
}

export function readMowingEntry(entry: unknown): RawMowingEntry | null {
  if (!isRecord(entry)) return null;
  let date: Ymd | null;
  if (Array.isArray(entry.date)) {
    const dates = entry.date.map(coerceYMD);
    if (!dates.length || dates.some((d) => d === null)) return null;
    date = dates.reduce<Ymd | null>((max, d) => (max === null || (d !== null && d > max) ? d : max), null);
  } else {
    date = coerceYMD(entry.date);
  }
  if (!date) return null;

  const rawHeight = entry.height_cm ?? entry.hauteur ?? entry.height;
  if (rawHeight === undefined || rawHeight === null) {
    return { kind: "record", date, height_cm: null };
  }
  const height = coerceNumber(rawHeight);
  if (height === null || height < 0) return null;
  return { kind: "record", date, height_cm: height };
}

export function toWateringEvent(raw: RawWateringEntry, defaultPlants: string[]): WateringEvent {
  switch (raw.kind) {
    case "bare-date":
      return { date: raw.date, plants: [...defaultPlants] };
    case "record":
      return { date: raw.date, plants: raw.plants ? [...raw.plants] : [...defaultPlants] };
  }
}

export function normaliseJournal(raw: unknown, options: JournalNormaliseOptions): NormalisedJournal {
  const warnings: string[] = [];
  const journal = createEmptyJournal();
  if (raw === null || raw === undefined) {
    return { journal, warnings };
  }
  if (!isRecord(raw)) {
    warnings.push(`Journal ignored: expected a mapping, got ${JSON.stringify(raw)}`);
    return { journal, warnings };
  }

  const wateringList = raw.watering ?? raw.arrosages;
  if (Array.isArray(wateringList)) {
    for (const entry of wateringList) {
      const parsed = readWateringEntry(entry);
      if (!parsed) {
        warnings.push(`Malformed watering entry skipped: ${JSON.stringify(entry)}`);
        continue;
      }
      journal.watering.push(toWateringEvent(parsed, options.defaultPlants));
    }
  } else if (wateringList !== undefined && wateringList !== null) {
    warnings.push(`Watering history ignored: expected a list, got ${JSON.stringify(wateringList)}`);
  }

  const mowingList = raw.mowing ?? raw.tontes;
  if (Array.isArray(mowingList)) {
    for (const entry of mowingList) {
      const parsed = readMowingEntry(entry);
      if (!parsed) {
        warnings.push(`Malformed mowing entry skipped: ${JSON.stringify(entry)}`);
        continue;
      }
      journal.mowing.push({ date: parsed.date, height_cm: parsed.height_cm ?? options.defaultCutHeightCm });
    }
  } else if (mowingList !== undefined && mowingList !== null) {
    warnings.push(`Mowing history ignored: expected a list, got ${JSON.stringify(mowingList)}`);
  }

  journal.watering.sort((a, b) => a.date.localeCompare(b.date));
  journal.mowing.sort((a, b) => a.date.localeCompare(b.date));
  return { journal, warnings };
}

export function recordWatering(journal: GardenJournal, date: Ymd, plants: string[]): GardenJournal {
  if (!isYMD(date)) {
    throw new Error(`Invalid watering date ${date}`);
  }
  const names = [...new Set(plants.map((p) => p.trim()).filter((p) => p.length > 0))];
  if (!names.length) {
    throw new Error("Select at least one plant to record a watering");
  }
  return {
    watering: [...journal.watering, { date, plants: names }],
    mowing: [...journal.mowing],
  };
}

export function recordMowing(journal: GardenJournal, date: Ymd, heightCm: number): GardenJournal {
  if (!isYMD(date)) {
    throw new Error(`Invalid mowing date ${date}`);
  }
  if (!Number.isFinite(heightCm) || heightCm < 0) {
    throw new Error(`Invalid cut height ${heightCm}`);
  }
  return {
    watering: [...journal.watering],
    mowing: [...journal.mowing, { date, height_cm: heightCm }],
  };
}

export function serialiseJournal(journal: GardenJournal): {
  watering: WateringEvent[];
  mowing: MowingEvent[];
} {
  return {
    watering: journal.watering.map((event) => ({ date: event.date, plants: [...event.plants] })),
    mowing: journal.mowing.map((event) => ({ date: event.date, height_cm: event.height_cm })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
