import { findFamilyForPlant, normalisePlantName } from "../catalog";
import type { GardenCatalog, PlantFamily } from "../catalog";
import type { GardenJournal, PlantUnit, SoilType, WateringEvent, WeatherDay, Ymd } from "../types";
import { unitKey } from "../types";
import { addDays } from "../utils/dates";
import { logger } from "../utils/logger";
import { findMissingDays, indexWeather } from "./weatherSeries";

export const DEFAULT_HISTORY_WINDOW_DAYS = 7;

/** How one plant unit is exposed to the weather. */
export interface UnitExposure {
  unit: PlantUnit;
  key: string;
  family: PlantFamily;
  /** Kc × soil/mulch or container factor, applied to ET0. */
  demandFactor: number;
  rainExposed: boolean;
}

export interface DeficitInput {
  weather: ReadonlyArray<WeatherDay>;
  catalog: GardenCatalog;
  journal: Pick<GardenJournal, "watering">;
  units: ReadonlyArray<PlantUnit>;
  soil: SoilType;
  mulched: boolean;
  asOf: Ymd;
  historyWindowDays?: number;
}

export interface DeficitComputation {
  asOf: Ymd;
  /** First day of the accumulation window. */
  start: Ymd;
  deficits: Record<string, number>;
  /** Window days without weather; counted as no rain and no demand. */
  missingDays: Ymd[];
}

export type DeficitStatus =
  | "surplus"
  | "negligible"
  | "rain-expected"
  | "light-deficit"
  | "action-required";

export interface DeficitClassification {
  needsWater: boolean;
  status: DeficitStatus;
  reason: string;
}

export interface ClassificationInput {
  deficit: number;
  threshold: number;
  rainNext24h: number;
  rainNext48h: number;
}

export function resolveUnitExposure(
  unit: PlantUnit,
  catalog: GardenCatalog,
  soil: SoilType,
  mulched: boolean,
): UnitExposure | null {
  const family = findFamilyForPlant(catalog, unit.plant);
  if (!family) return null;
  const modeFactor =
    unit.mode === "open_ground"
      ? catalog.soils[soil].retention_factor * (mulched ? catalog.mulch_factor : 1)
      : catalog.container_factor;
  return {
    unit,
    key: unitKey(unit),
    family,
    demandFactor: family.crop_coefficient * modeFactor,
    rainExposed: unit.mode !== "covered_container",
  };
}

/** Known units, first occurrence of each key; unknown plants are dropped. */
export function resolveExposures(
  units: ReadonlyArray<PlantUnit>,
  catalog: GardenCatalog,
  soil: SoilType,
  mulched: boolean,
): UnitExposure[] {
  const seen = new Set<string>();
  const exposures: UnitExposure[] = [];
  for (const unit of units) {
    const exposure = resolveUnitExposure(unit, catalog, soil, mulched);
    if (!exposure) {
      logger.debug("Plant not in catalog, skipped", { plant: unit.plant });
      continue;
    }
    if (seen.has(exposure.key)) continue;
    seen.add(exposure.key);
    exposures.push(exposure);
  }
  return exposures;
}

/** Demand minus exposed rain for one day, without clamping. */
export function dailyBalance(day: WeatherDay | undefined, exposure: UnitExposure): number {
  if (!day) return 0;
  const demand = day.et0_mm * exposure.demandFactor;
  const rain = exposure.rainExposed ? day.rain_mm : 0;
  return demand - rain;
}

export function computeDeficits(input: DeficitInput): DeficitComputation {
  const window = Math.max(1, Math.round(input.historyWindowDays ?? DEFAULT_HISTORY_WINDOW_DAYS));
  const start = addDays(input.asOf, -(window - 1));
  const exposures = resolveExposures(input.units, input.catalog, input.soil, input.mulched);
  const deficits: Record<string, number> = {};
  if (exposures.length === 0) {
    return { asOf: input.asOf, start, deficits, missingDays: [] };
  }

  const index = indexWeather(input.weather);
  const missingDays = findMissingDays(index, start, input.asOf);
  const watered = wateredNamesByDate(input.journal.watering, start, input.asOf);

  for (const exposure of exposures) {
    let total = 0;
    for (let date = start; date <= input.asOf; date = addDays(date, 1)) {
      total += dailyBalance(index.get(date), exposure);
      const names = watered.get(date);
      if (names && wateringCovers(names, exposure.family, exposure.unit)) {
        total = 0;
      }
      total = Math.max(0, total);
    }
    deficits[exposure.key] = total;
  }

  return { asOf: input.asOf, start, deficits, missingDays };
}

export function classifyDeficit(input: ClassificationInput): DeficitClassification {
  const { deficit, threshold, rainNext24h, rainNext48h } = input;
  const mm = deficit.toFixed(1);
  if (deficit <= 0) {
    return { needsWater: false, status: "surplus", reason: `No deficit (${mm} mm)` };
  }
  if (deficit <= threshold * 0.25) {
    return { needsWater: false, status: "negligible", reason: `Negligible deficit: ${mm} mm` };
  }
  if (deficit <= threshold) {
    if (rainNext24h >= deficit) {
      return {
        needsWater: false,
        status: "rain-expected",
        reason: `Rain within 24 h (${rainNext24h.toFixed(1)} mm) will cover the ${mm} mm deficit`,
      };
    }
    return { needsWater: false, status: "light-deficit", reason: `Light deficit: ${mm} mm` };
  }
  if (rainNext48h >= deficit) {
    if (deficit <= threshold * 1.25) {
      return {
        needsWater: false,
        status: "rain-expected",
        reason: `Rain within 48 h (${rainNext48h.toFixed(1)} mm) will cover the ${mm} mm deficit`,
      };
    }
    return {
      needsWater: true,
      status: "action-required",
      reason: `Critical deficit: ${mm} mm (48 h rain: ${rainNext48h.toFixed(1)} mm)`,
    };
  }
  return { needsWater: true, status: "action-required", reason: `Deficit: ${mm} mm` };
}

/** Largest unit deficit per family; a display view over the unit map. */
export function projectFamilyDeficits(
  deficits: Readonly<Record<string, number>>,
  catalog: GardenCatalog,
): Record<string, number> {
  const families: Record<string, number> = {};
  for (const [key, value] of Object.entries(deficits)) {
    const plant = key.slice(0, key.lastIndexOf("@"));
    const family = findFamilyForPlant(catalog, plant);
    if (!family) continue;
    families[family.code] = Math.max(families[family.code] ?? 0, value);
  }
  return families;
}

function wateredNamesByDate(
  events: ReadonlyArray<WateringEvent>,
  start: Ymd,
  end: Ymd,
): Map<Ymd, Set<string>> {
  const byDate = new Map<Ymd, Set<string>>();
  for (const event of events) {
    if (event.date < start || event.date > end) continue;
    const names = byDate.get(event.date) ?? new Set<string>();
    for (const plant of event.plants) names.add(normalisePlantName(plant));
    byDate.set(event.date, names);
  }
  return byDate;
}

function wateringCovers(names: ReadonlySet<string>, family: PlantFamily, unit: PlantUnit): boolean {
  if (names.has(normalisePlantName(unit.plant))) return true;
  if (names.has(normalisePlantName(family.code))) return true;
  return family.members.some((member) => names.has(normalisePlantName(member)));
}
