import { readFile } from "node:fs/promises";
import bundledCatalog from "./catalog.json";
import { SOIL_TYPES, isSoilType } from "../types";
import type { SoilType } from "../types";
import type { GardenCatalog, PlantFamily, SoilProfile } from "./types";

export type { GardenCatalog, MonthlyAdvice, MonthlyAdviceBook, PlantFamily, SoilProfile } from "./types";
export { defaultAdviceBook, monthlyAdvice, parseAdviceBook } from "./advice";

export class CatalogUnavailableError extends Error {
  constructor(detail: string) {
    super(`reference data unavailable: ${detail}`);
    this.name = "CatalogUnavailableError";
  }
}

/** Catalog shipped with the package. A fresh value on every call. */
export function defaultCatalog(): GardenCatalog {
  return parseCatalog(bundledCatalog);
}

export async function loadCatalog(path?: string): Promise<GardenCatalog> {
  if (!path) return defaultCatalog();
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogUnavailableError(`cannot read ${path} (${reason})`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogUnavailableError(`cannot parse ${path} (${reason})`);
  }
  return parseCatalog(data);
}

export function parseCatalog(data: unknown): GardenCatalog {
  if (!isRecord(data)) {
    throw new CatalogUnavailableError("catalog must be an object");
  }
  const mulch = positiveNumber(data.mulch_factor, "mulch_factor");
  const container = positiveNumber(data.container_factor, "container_factor");

  if (!Array.isArray(data.soils)) {
    throw new CatalogUnavailableError("soils must be a list");
  }
  const soils: Partial<Record<SoilType, SoilProfile>> = {};
  for (const entry of data.soils) {
    if (!isRecord(entry) || !isSoilType(entry.soil_type)) {
      throw new CatalogUnavailableError(`invalid soil entry ${JSON.stringify(entry)}`);
    }
    soils[entry.soil_type] = {
      soil_type: entry.soil_type,
      retention_factor: positiveNumber(entry.retention_factor, `${entry.soil_type}.retention_factor`),
      deficit_threshold_mm: positiveNumber(entry.deficit_threshold_mm, `${entry.soil_type}.deficit_threshold_mm`),
    };
  }
  const missing = SOIL_TYPES.filter((type) => !soils[type]);
  if (missing.length) {
    throw new CatalogUnavailableError(`missing soil profiles: ${missing.join(", ")}`);
  }
  const requireSoil = (type: SoilType): SoilProfile => {
    const profile = soils[type];
    if (!profile) throw new CatalogUnavailableError(`missing soil profile ${type}`);
    return profile;
  };

  if (!Array.isArray(data.families)) {
    throw new CatalogUnavailableError("families must be a list");
  }
  const families: Record<string, PlantFamily> = {};
  const plantIndex: Record<string, string> = {};
  for (const entry of data.families) {
    const family = parseFamily(entry);
    if (families[family.code]) {
      throw new CatalogUnavailableError(`duplicate family ${family.code}`);
    }
    for (const member of family.members) {
      const key = normalisePlantName(member);
      const owner = plantIndex[key];
      if (owner) {
        throw new CatalogUnavailableError(`plant ${member} listed in ${owner} and ${family.code}`);
      }
      plantIndex[key] = family.code;
    }
    families[family.code] = family;
  }

  return {
    families,
    soils: {
      Sableux: requireSoil("Sableux"),
      Limoneux: requireSoil("Limoneux"),
      Argileux: requireSoil("Argileux"),
    },
    mulch_factor: mulch,
    container_factor: container,
    plant_index: plantIndex,
  };
}

export function findFamilyForPlant(catalog: GardenCatalog, plant: string): PlantFamily | undefined {
  const code = catalog.plant_index[normalisePlantName(plant)];
  return code ? catalog.families[code] : undefined;
}

export function listCatalogPlants(catalog: GardenCatalog): string[] {
  return Object.values(catalog.families)
    .flatMap((family) => family.members)
    .sort((a, b) => a.localeCompare(b));
}

export function normalisePlantName(name: string): string {
  return name.trim().toLowerCase();
}

function parseFamily(entry: unknown): PlantFamily {
  if (!isRecord(entry) || typeof entry.code !== "string" || !entry.code.trim()) {
    throw new CatalogUnavailableError(`invalid family entry ${JSON.stringify(entry)}`);
  }
  const code = entry.code.trim();
  if (!Array.isArray(entry.members) || !entry.members.every((m): m is string => typeof m === "string")) {
    throw new CatalogUnavailableError(`family ${code} must list its members`);
  }
  return {
    code,
    label: typeof entry.label === "string" ? entry.label : code,
    crop_coefficient: positiveNumber(entry.crop_coefficient, `${code}.crop_coefficient`),
    members: entry.members.map((m) => m.trim()).filter((m) => m.length > 0),
  };
}

function positiveNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new CatalogUnavailableError(`${field} must be a positive number`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
