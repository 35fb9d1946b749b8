import type { WeatherDay, Ymd } from "../types";
import { coerceNumber } from "../settings";
import { addDays, coerceYMD, eachDay } from "../utils/dates";

export interface NormalisedSeries {
  series: WeatherDay[];
  warnings: string[];
}

/**
 * Coerces provider rows into WeatherDay records: numeric fields that are missing,
 * null or non-finite become 0, rows without a usable date are dropped, the result
 * is sorted by date with one record per date (the last one wins).
 */
export function normaliseWeatherSeries(rows: ReadonlyArray<unknown>): NormalisedSeries {
  const warnings: string[] = [];
  const byDate = new Map<Ymd, WeatherDay>();
  let zeroFilled = 0;

  for (const row of rows) {
    if (typeof row !== "object" || row === null) {
      warnings.push(`Weather row ignored: ${JSON.stringify(row)}`);
      continue;
    }
    const record: Record<string, unknown> = { ...row };
    const date = coerceYMD(record.date);
    if (!date) {
      warnings.push(`Weather row without a valid date ignored: ${JSON.stringify(row)}`);
      continue;
    }
    const temp = coerceNumber(record.temp_max);
    const rain = coerceNumber(record.rain_mm);
    const et0 = coerceNumber(record.et0_mm);
    if (temp === null || rain === null || et0 === null) zeroFilled++;

    const day: WeatherDay = {
      date,
      temp_max: temp ?? 0,
      rain_mm: Math.max(0, rain ?? 0),
      et0_mm: Math.max(0, et0 ?? 0),
    };
    const wind = coerceNumber(record.wind_kmh);
    const radiation = coerceNumber(record.radiation_mj);
    if (wind !== null) day.wind_kmh = wind;
    if (radiation !== null) day.radiation_mj = radiation;

    if (byDate.has(date)) {
      warnings.push(`Duplicate weather record for ${date}; keeping the last one`);
    }
    byDate.set(date, day);
  }

  if (zeroFilled > 0) {
    warnings.push(`${zeroFilled} weather record(s) had missing values replaced by 0`);
  }

  const series = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
  return { series, warnings };
}

export function indexWeather(series: ReadonlyArray<WeatherDay>): Map<Ymd, WeatherDay> {
  return new Map(series.map((day) => [day.date, day]));
}

/** Dates of `[start, end]` with no record in the series. */
export function findMissingDays(
  index: ReadonlyMap<Ymd, WeatherDay>,
  start: Ymd,
  end: Ymd,
): Ymd[] {
  return eachDay(start, end).filter((date) => !index.has(date));
}

/** Days strictly after `today`, optionally limited to the next `days` days. */
export function forecastAfter(
  series: ReadonlyArray<WeatherDay>,
  today: Ymd,
  days?: number,
): WeatherDay[] {
  const last = days === undefined ? null : addDays(today, days);
  return series.filter((day) => day.date > today && (last === null || day.date <= last));
}

/** Rain over `(today, today + days]`. */
export function rainBetween(series: ReadonlyArray<WeatherDay>, today: Ymd, days: number): number {
  return forecastAfter(series, today, days).reduce((sum, day) => sum + day.rain_mm, 0);
}

export function countHotDays(
  series: ReadonlyArray<WeatherDay>,
  today: Ymd,
  days: number,
  thresholdC: number,
): number {
  return forecastAfter(series, today, days).filter((day) => day.temp_max >= thresholdC).length;
}

export function describeMissingDays(
  missing: Ymd[],
  effect = "counted as no rain and no demand",
): string {
  const shown = missing.slice(0, 5).join(", ");
  const more = missing.length > 5 ? ` and ${missing.length - 5} more` : "";
  return `No weather data for ${missing.length} day(s) (${shown}${more}); ${effect}`;
}
