export type Ymd = string; // YYYY-MM-DD

export type CultivationMode = "open_ground" | "container" | "covered_container";
export type SoilType = "Sableux" | "Limoneux" | "Argileux";

export const CULTIVATION_MODES: CultivationMode[] = ["open_ground", "container", "covered_container"];
export const SOIL_TYPES: SoilType[] = ["Sableux", "Limoneux", "Argileux"];

export interface WeatherDay {
  date: Ymd;
  temp_max: number; // °C
  rain_mm: number;
  et0_mm: number;
  wind_kmh?: number;
  radiation_mj?: number;
}

export interface PlantUnit {
  plant: string;
  mode: CultivationMode;
}

export interface WateringEvent {
  date: Ymd;
  plants: string[];
}

export interface MowingEvent {
  date: Ymd;
  height_cm: number;
}

export interface GardenJournal {
  watering: WateringEvent[];
  mowing: MowingEvent[];
}

export interface DeficitState {
  as_of: Ymd | null;
  deficits: Record<string, number>;
}

export interface GardenLocation {
  name: string;
  latitude?: number;
  longitude?: number;
}

export interface GardenPreferences {
  units: PlantUnit[];
  soil_type: SoilType;
  mulched: boolean;
  location: GardenLocation;
  target_height_cm?: number;
}

export interface GrowthModel {
  base_rate_mm: number;
}

export interface GardenSettings {
  history_window_days: number;
  watering_forecast_days: number;
  default_mow_lookback_days: number;
  default_cut_height_cm: number;
  target_height_cm: number;
  mow_overgrowth_ratio: number;
  growth: GrowthModel;
  weather: { past_days: number; forecast_days: number; timezone: string };
  alerts: { heat_temp_c: number; heat_days: number; rain_notice_mm: number };
  data_dir: string;
  catalog_path?: string;
}

export function unitKey(unit: PlantUnit): string {
  return `${unit.plant}@${unit.mode}`;
}

export function isCultivationMode(value: unknown): value is CultivationMode {
  return CULTIVATION_MODES.some((mode) => mode === value);
}

export function isSoilType(value: unknown): value is SoilType {
  return SOIL_TYPES.some((soil) => soil === value);
}
