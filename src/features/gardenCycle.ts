import { monthlyAdvice } from "../catalog";
import type { GardenCatalog, MonthlyAdvice, MonthlyAdviceBook } from "../catalog";
import type {
  DeficitState,
  GardenJournal,
  GardenPreferences,
  GardenSettings,
  PlantUnit,
  SoilType,
  WeatherDay,
  Ymd,
} from "../types";
import {
  type DeficitClassification,
  classifyDeficit,
  computeDeficits,
  projectFamilyDeficits,
  resolveExposures,
} from "../logic/hydricBalance";
import { estimateHeight, latestMowing } from "../logic/growth";
import { nextMowDate, nextWateringDate } from "../logic/forecast";
import { countHotDays, describeMissingDays, forecastAfter, rainBetween } from "../logic/weatherSeries";
import { logger } from "../utils/logger";

export interface GardenCycleInput {
  today: Ymd;
  settings: GardenSettings;
  preferences: GardenPreferences;
  catalog: GardenCatalog;
  journal: GardenJournal;
  weather: ReadonlyArray<WeatherDay>;
  /** Defaults to the bundled advice. */
  advice?: MonthlyAdviceBook;
  /** Already collected upstream (weather decoding, journal loading). */
  warnings?: ReadonlyArray<string>;
}

export interface UnitRecommendation {
  unit: PlantUnit;
  key: string;
  family: string;
  deficit: number;
  classification: DeficitClassification;
}

export type GardenAlertKind = "heat" | "rain";

export interface GardenAlert {
  kind: GardenAlertKind;
  message: string;
}

export interface LawnReport {
  heightCm: number;
  since: Ymd;
  targetHeightCm: number;
  /** Already at or above the overgrowth threshold today. */
  mowNow: boolean;
  /** First forecast day after today that reaches the threshold. */
  nextMowDate: Ymd | null;
}

export interface GardenReport {
  asOf: Ymd;
  soil: SoilType;
  mulched: boolean;
  thresholdMm: number;
  units: UnitRecommendation[];
  familyDeficits: Record<string, number>;
  /** Units whose deficit calls for watering today. */
  unitsToWater: number;
  nextWateringDate: Ymd | null;
  lawn: LawnReport;
  rain: { next24h: number; next48h: number };
  alerts: GardenAlert[];
  advice: MonthlyAdvice | null;
  warnings: string[];
  /** Snapshot to persist; replaces the previous one. */
  state: DeficitState;
}

/** One read-compute pass: today's deficits, lawn height and the forward dates. */
export function runGardenCycle(input: GardenCycleInput): GardenReport {
  const { today, settings, preferences, catalog, journal, weather } = input;
  const soil = preferences.soil_type;
  const thresholdMm = catalog.soils[soil].deficit_threshold_mm;
  const warnings: string[] = [...(input.warnings ?? [])];

  const balance = computeDeficits({
    weather,
    catalog,
    journal,
    units: preferences.units,
    soil,
    mulched: preferences.mulched,
    asOf: today,
    historyWindowDays: settings.history_window_days,
  });

  const next24h = rainBetween(weather, today, 1);
  const next48h = rainBetween(weather, today, 2);

  const units = resolveExposures(preferences.units, catalog, soil, preferences.mulched).map(
    (exposure): UnitRecommendation => {
      const deficit = balance.deficits[exposure.key] ?? 0;
      return {
        unit: exposure.unit,
        key: exposure.key,
        family: exposure.family.code,
        deficit,
        classification: classifyDeficit({ deficit, threshold: thresholdMm, rainNext24h: next24h, rainNext48h: next48h }),
      };
    },
  );

  const watering = nextWateringDate({
    forecast: forecastAfter(weather, today, settings.watering_forecast_days),
    units: preferences.units,
    catalog,
    soil,
    mulched: preferences.mulched,
    threshold: thresholdMm,
  });

  const lastMow = latestMowing(journal.mowing.filter((event) => event.date <= today));
  const height = estimateHeight({
    weather,
    lastMow,
    asOf: today,
    defaultHeightCm: settings.default_cut_height_cm,
    defaultLookbackDays: settings.default_mow_lookback_days,
    model: settings.growth,
  });
  const missingDays = [...new Set([...balance.missingDays, ...height.missingDays])].sort();
  if (missingDays.length) {
    warnings.push(describeMissingDays(missingDays, "counted as no rain, no demand and no growth"));
  }
  const targetHeightCm = preferences.target_height_cm ?? settings.target_height_cm;
  const mowNow = height.heightCm >= targetHeightCm * settings.mow_overgrowth_ratio;
  const mowDate = nextMowDate({
    forecast: forecastAfter(weather, today),
    currentHeightCm: height.heightCm,
    targetHeightCm,
    model: settings.growth,
    overgrowthRatio: settings.mow_overgrowth_ratio,
  });

  const alerts = buildAlerts(weather, today, settings, next48h);
  logger.info("Garden cycle computed", {
    date: today,
    units: units.length,
    nextWatering: watering,
    nextMow: mowNow ? today : mowDate,
  });

  return {
    asOf: today,
    soil,
    mulched: preferences.mulched,
    thresholdMm,
    units,
    familyDeficits: projectFamilyDeficits(balance.deficits, catalog),
    unitsToWater: units.filter((item) => item.classification.needsWater).length,
    nextWateringDate: watering,
    lawn: { heightCm: height.heightCm, since: height.since, targetHeightCm, mowNow, nextMowDate: mowDate },
    rain: { next24h, next48h },
    alerts,
    advice: monthlyAdvice(Number(today.slice(5, 7)), input.advice),
    warnings: [...new Set(warnings)],
    state: { as_of: today, deficits: { ...balance.deficits } },
  };
}

export function buildAlerts(
  weather: ReadonlyArray<WeatherDay>,
  today: Ymd,
  settings: Pick<GardenSettings, "alerts">,
  rainNext48h = rainBetween(weather, today, 2),
): GardenAlert[] {
  const alerts: GardenAlert[] = [];
  const { heat_temp_c, heat_days, rain_notice_mm } = settings.alerts;
  const hotDays = countHotDays(weather, today, 2, heat_temp_c);
  if (hotDays >= heat_days) {
    alerts.push({
      kind: "heat",
      message: `Heat alert: ${hotDays} day(s) at or above ${heat_temp_c} °C in the next 48 h; water in the evening`,
    });
  }
  if (rainNext48h >= rain_notice_mm) {
    alerts.push({
      kind: "rain",
      message: `Rain expected: ${rainNext48h.toFixed(1)} mm in the next 48 h`,
    });
  }
  return alerts;
}
