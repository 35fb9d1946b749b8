import type { SoilType } from "../types";

export interface PlantFamily {
  code: string;
  label: string;
  crop_coefficient: number;
  members: string[];
}

export interface SoilProfile {
  soil_type: SoilType;
  retention_factor: number;
  deficit_threshold_mm: number;
}

export interface GardenCatalog {
  families: Record<string, PlantFamily>;
  soils: Record<SoilType, SoilProfile>;
  /** Multiplier on open-ground demand when the bed is mulched. */
  mulch_factor: number;
  /** Replaces soil and mulch factors for both container modes. */
  container_factor: number;
  /** Lower-cased plant name -> family code. */
  plant_index: Record<string, string>;
}

export interface MonthlyAdvice {
  /** 1 = January. */
  month: number;
  title: string;
  tips: string[];
}

export type MonthlyAdviceBook = Partial<Record<number, MonthlyAdvice>>;
