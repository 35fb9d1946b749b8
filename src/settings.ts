import type { GardenSettings } from "./types";

export const DEFAULT_SETTINGS: GardenSettings = {
  history_window_days: 7,
  watering_forecast_days: 7,
  default_mow_lookback_days: 14,
  default_cut_height_cm: 5,
  target_height_cm: 5,
  mow_overgrowth_ratio: 1.5,
  growth: { base_rate_mm: 0.5 },
  weather: { past_days: 7, forecast_days: 14, timezone: "Europe/Paris" },
  alerts: { heat_temp_c: 30, heat_days: 2, rain_notice_mm: 10 },
  data_dir: "garden-data",
};

export function cloneSettings(settings: GardenSettings): GardenSettings {
  return {
    ...settings,
    growth: { ...settings.growth },
    weather: { ...settings.weather },
    alerts: { ...settings.alerts },
  };
}

/** Overlay saved values onto a copy of the defaults; invalid values keep the default. */
export function mergeSettings(defaults: GardenSettings, saved: unknown): GardenSettings {
  const merged = cloneSettings(defaults);
  if (!isRecord(saved)) {
    return merged;
  }

  const positive = (value: unknown, current: number): number => {
    const n = coerceNumber(value);
    return n !== null && n > 0 ? n : current;
  };

  merged.history_window_days = Math.round(positive(saved.history_window_days, merged.history_window_days));
  merged.watering_forecast_days = Math.round(positive(saved.watering_forecast_days, merged.watering_forecast_days));
  merged.default_mow_lookback_days = Math.round(
    positive(saved.default_mow_lookback_days, merged.default_mow_lookback_days),
  );
  merged.default_cut_height_cm = positive(saved.default_cut_height_cm, merged.default_cut_height_cm);
  merged.target_height_cm = positive(saved.target_height_cm, merged.target_height_cm);
  merged.mow_overgrowth_ratio = positive(saved.mow_overgrowth_ratio, merged.mow_overgrowth_ratio);

  if (isRecord(saved.growth)) {
    merged.growth.base_rate_mm = positive(saved.growth.base_rate_mm, merged.growth.base_rate_mm);
  }
  if (isRecord(saved.weather)) {
    merged.weather.past_days = Math.round(positive(saved.weather.past_days, merged.weather.past_days));
    merged.weather.forecast_days = Math.round(positive(saved.weather.forecast_days, merged.weather.forecast_days));
    if (typeof saved.weather.timezone === "string" && saved.weather.timezone.trim()) {
      merged.weather.timezone = saved.weather.timezone.trim();
    }
  }
  if (isRecord(saved.alerts)) {
    const heat = coerceNumber(saved.alerts.heat_temp_c);
    if (heat !== null) merged.alerts.heat_temp_c = heat;
    merged.alerts.heat_days = Math.round(positive(saved.alerts.heat_days, merged.alerts.heat_days));
    merged.alerts.rain_notice_mm = positive(saved.alerts.rain_notice_mm, merged.alerts.rain_notice_mm);
  }
  if (typeof saved.catalog_path === "string" && saved.catalog_path.trim()) {
    merged.catalog_path = saved.catalog_path.trim();
  }
  return merged;
}

/** GARDEN_DATA_DIR and GARDEN_CATALOG override whatever the settings file says. */
export function applyEnvironment(settings: GardenSettings, env: NodeJS.ProcessEnv = process.env): GardenSettings {
  const next = cloneSettings(settings);
  const dataDir = env.GARDEN_DATA_DIR?.trim();
  if (dataDir) next.data_dir = dataDir;
  const catalog = env.GARDEN_CATALOG?.trim();
  if (catalog) next.catalog_path = catalog;
  return next;
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
