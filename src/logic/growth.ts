import type { GrowthModel, MowingEvent, WeatherDay, Ymd } from "../types";
import { addDays } from "../utils/dates";
import { findMissingDays, indexWeather } from "./weatherSeries";

export const DEFAULT_GROWTH_MODEL: GrowthModel = { base_rate_mm: 0.5 };
export const DEFAULT_MOW_LOOKBACK_DAYS = 14;
export const DEFAULT_CUT_HEIGHT_CM = 5;

const FACTOR_FLOOR = 0.1;

/** Daily grass growth in millimetres. */
export function grassGrowthRate(
  day: Pick<WeatherDay, "temp_max" | "rain_mm" | "et0_mm">,
  model: GrowthModel = DEFAULT_GROWTH_MODEL,
): number {
  let tempFactor = 1;
  if (day.temp_max > 25) {
    tempFactor = 1 - (day.temp_max - 25) * 0.05;
  } else if (day.temp_max < 10) {
    tempFactor = 0.5;
  }
  const rainFactor = 1 + day.rain_mm * 0.1;
  const et0Factor = 1 - day.et0_mm * 0.05;

  const growth =
    model.base_rate_mm *
    Math.max(FACTOR_FLOOR, tempFactor) *
    Math.max(FACTOR_FLOOR, rainFactor) *
    Math.max(FACTOR_FLOOR, et0Factor);
  return Math.max(0, growth);
}

export interface HeightInput {
  weather: ReadonlyArray<WeatherDay>;
  lastMow: MowingEvent | null;
  asOf: Ymd;
  defaultHeightCm?: number;
  defaultLookbackDays?: number;
  model?: GrowthModel;
}

export interface HeightEstimate {
  heightCm: number;
  /** First day whose growth was counted. */
  since: Ymd;
  /** Days in the growth period without weather; they add no growth. */
  missingDays: Ymd[];
}

export function estimateHeight(input: HeightInput): HeightEstimate {
  const model = input.model ?? DEFAULT_GROWTH_MODEL;
  const since = input.lastMow
    ? input.lastMow.date
    : addDays(input.asOf, -(input.defaultLookbackDays ?? DEFAULT_MOW_LOOKBACK_DAYS));
  const startHeight = Math.max(0, input.lastMow?.height_cm ?? input.defaultHeightCm ?? DEFAULT_CUT_HEIGHT_CM);
  if (since > input.asOf) {
    return { heightCm: startHeight, since, missingDays: [] };
  }

  const index = indexWeather(input.weather);
  const missingDays = findMissingDays(index, since, input.asOf);

  let growthMm = 0;
  for (let date = since; date <= input.asOf; date = addDays(date, 1)) {
    const day = index.get(date);
    if (day) growthMm += grassGrowthRate(day, model);
  }
  return { heightCm: startHeight + growthMm / 10, since, missingDays };
}

/** Height after the most recent recorded cut, or the fallback when none is recorded. */
export function defaultCutHeight(mowing: ReadonlyArray<MowingEvent>, fallback = DEFAULT_CUT_HEIGHT_CM): number {
  const last = latestMowing(mowing);
  return last ? last.height_cm : fallback;
}

export function latestMowing(mowing: ReadonlyArray<MowingEvent>): MowingEvent | null {
  let latest: MowingEvent | null = null;
  for (const event of mowing) {
    if (!latest || event.date >= latest.date) latest = event;
  }
  return latest;
}
