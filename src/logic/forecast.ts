import type { GardenCatalog } from "../catalog";
import type { GrowthModel, PlantUnit, SoilType, WeatherDay, Ymd } from "../types";
import { DEFAULT_GROWTH_MODEL, grassGrowthRate } from "./growth";
import { dailyBalance, resolveExposures } from "./hydricBalance";

export const MOW_OVERGROWTH_RATIO = 1.5;

export interface WateringForecastInput {
  /** Future days only, in date order. */
  forecast: ReadonlyArray<WeatherDay>;
  units: ReadonlyArray<PlantUnit>;
  catalog: GardenCatalog;
  soil: SoilType;
  mulched: boolean;
  threshold: number;
}

export interface UnitCrossing {
  unit: PlantUnit;
  key: string;
  date: Ymd | null;
}

/**
 * Replays the daily balance from a zero total for every unit and reports the
 * first forecast day on which the total reaches the threshold.
 */
export function wateringCrossings(input: WateringForecastInput): UnitCrossing[] {
  const exposures = resolveExposures(input.units, input.catalog, input.soil, input.mulched);
  return exposures.map((exposure) => {
    let total = 0;
    for (const day of input.forecast) {
      total = Math.max(0, total + dailyBalance(day, exposure));
      if (total >= input.threshold) {
        return { unit: exposure.unit, key: exposure.key, date: day.date };
      }
    }
    return { unit: exposure.unit, key: exposure.key, date: null };
  });
}

/** Earliest crossing across all units: the most constrained plant sets the date. */
export function nextWateringDate(input: WateringForecastInput): Ymd | null {
  let earliest: Ymd | null = null;
  for (const crossing of wateringCrossings(input)) {
    if (crossing.date && (earliest === null || crossing.date < earliest)) {
      earliest = crossing.date;
    }
  }
  return earliest;
}

export interface MowForecastInput {
  forecast: ReadonlyArray<WeatherDay>;
  currentHeightCm: number;
  targetHeightCm: number;
  model?: GrowthModel;
  overgrowthRatio?: number;
}

export function nextMowDate(input: MowForecastInput): Ymd | null {
  const model = input.model ?? DEFAULT_GROWTH_MODEL;
  const mowAt = input.targetHeightCm * (input.overgrowthRatio ?? MOW_OVERGROWTH_RATIO);
  let height = input.currentHeightCm;
  for (const day of input.forecast) {
    height += grassGrowthRate(day, model) / 10;
    if (height >= mowAt) {
      return day.date;
    }
  }
  return null;
}
