import { join } from "node:path";
import type {
  DeficitState,
  GardenJournal,
  GardenLocation,
  GardenPreferences,
  GardenSettings,
  PlantUnit,
  Ymd,
} from "../types";
import { isCultivationMode, isSoilType } from "../types";
import { DEFAULT_SETTINGS, coerceNumber, mergeSettings } from "../settings";
import { coerceYMD } from "../utils/dates";
import { logger } from "../utils/logger";
import { readYamlFile, writeYamlFile } from "../yamlIO";
import {
  type JournalNormaliseOptions,
  type NormalisedJournal,
  normaliseJournal,
  recordMowing,
  recordWatering,
  serialiseJournal,
} from "./journal";

/** Raw document persistence; typing and validation happen in GardenStore. */
export interface DocumentStorage {
  load(): Promise<unknown>;
  save(document: unknown): Promise<void>;
}

export class InMemoryStorage implements DocumentStorage {
  constructor(private document: unknown = null) {}

  async load(): Promise<unknown> {
    return structuredClone(this.document);
  }

  async save(document: unknown): Promise<void> {
    this.document = structuredClone(document);
  }
}

export class YamlFileStorage implements DocumentStorage {
  constructor(readonly path: string) {}

  async load(): Promise<unknown> {
    return readYamlFile(this.path);
  }

  async save(document: unknown): Promise<void> {
    await writeYamlFile(this.path, document);
  }
}

export interface GardenStorages {
  settings: DocumentStorage;
  preferences: DocumentStorage;
  journal: DocumentStorage;
  state: DocumentStorage;
}

export const STORE_FILES = {
  settings: "settings.yaml",
  preferences: "preferences.yaml",
  journal: "journal.yaml",
  state: "garden_state.yaml",
} as const;

export interface LoadedPreferences {
  preferences: GardenPreferences;
  warnings: string[];
}

export const DEFAULT_PREFERENCES: GardenPreferences = {
  units: [],
  soil_type: "Limoneux",
  mulched: false,
  location: { name: "" },
};

export function createInMemoryStorages(seed: Partial<Record<keyof GardenStorages, unknown>> = {}): GardenStorages {
  return {
    settings: new InMemoryStorage(seed.settings ?? null),
    preferences: new InMemoryStorage(seed.preferences ?? null),
    journal: new InMemoryStorage(seed.journal ?? null),
    state: new InMemoryStorage(seed.state ?? null),
  };
}

export function createFileStorages(dataDir: string): GardenStorages {
  return {
    settings: new YamlFileStorage(join(dataDir, STORE_FILES.settings)),
    preferences: new YamlFileStorage(join(dataDir, STORE_FILES.preferences)),
    journal: new YamlFileStorage(join(dataDir, STORE_FILES.journal)),
    state: new YamlFileStorage(join(dataDir, STORE_FILES.state)),
  };
}

export class GardenStore {
  constructor(private readonly storages: GardenStorages) {}

  static forDirectory(dataDir: string): GardenStore {
    return new GardenStore(createFileStorages(dataDir));
  }

  async loadSettings(defaults: GardenSettings = DEFAULT_SETTINGS): Promise<GardenSettings> {
    return mergeSettings(defaults, await this.storages.settings.load());
  }

  async loadPreferences(): Promise<LoadedPreferences> {
    return normalisePreferences(await this.storages.preferences.load());
  }

  async savePreferences(preferences: GardenPreferences): Promise<void> {
    await this.storages.preferences.save({
      ...preferences,
      units: preferences.units.map((unit) => ({ ...unit })),
      location: { ...preferences.location },
    });
  }

  async loadJournal(options: JournalNormaliseOptions): Promise<NormalisedJournal> {
    const result = normaliseJournal(await this.storages.journal.load(), options);
    for (const warning of result.warnings) {
      logger.warn(warning);
    }
    return result;
  }

  async saveJournal(journal: GardenJournal): Promise<void> {
    await this.storages.journal.save(serialiseJournal(journal));
  }

  async appendWatering(date: Ymd, plants: string[], options: JournalNormaliseOptions): Promise<GardenJournal> {
    const { journal } = await this.loadJournal(options);
    const next = recordWatering(journal, date, plants);
    await this.saveJournal(next);
    return next;
  }

  async appendMowing(date: Ymd, heightCm: number, options: JournalNormaliseOptions): Promise<GardenJournal> {
    const { journal } = await this.loadJournal(options);
    const next = recordMowing(journal, date, heightCm);
    await this.saveJournal(next);
    return next;
  }

  async loadState(): Promise<DeficitState> {
    return normaliseState(await this.storages.state.load());
  }

  /** Replaces the whole snapshot. */
  async saveState(state: DeficitState): Promise<void> {
    await this.storages.state.save({ as_of: state.as_of, deficits: { ...state.deficits } });
  }
}

export function normalisePreferences(raw: unknown): LoadedPreferences {
  const warnings: string[] = [];
  const preferences: GardenPreferences = {
    ...DEFAULT_PREFERENCES,
    units: [],
    location: { ...DEFAULT_PREFERENCES.location },
  };
  if (!isRecord(raw)) {
    return { preferences, warnings };
  }

  if (Array.isArray(raw.units)) {
    for (const entry of raw.units) {
      const unit = readPlantUnit(entry);
      if (unit) {
        preferences.units.push(unit);
      } else {
        warnings.push(`Tracked plant entry ignored: ${JSON.stringify(entry)}`);
      }
    }
  }
  if (raw.soil_type !== undefined) {
    if (isSoilType(raw.soil_type)) {
      preferences.soil_type = raw.soil_type;
    } else {
      warnings.push(`Unknown soil type ${JSON.stringify(raw.soil_type)}; using ${preferences.soil_type}`);
    }
  }
  preferences.mulched = raw.mulched === true;
  preferences.location = readLocation(raw.location);
  const target = coerceNumber(raw.target_height_cm);
  if (target !== null && target > 0) {
    preferences.target_height_cm = target;
  }
  return { preferences, warnings };
}

export function normaliseState(raw: unknown): DeficitState {
  if (!isRecord(raw)) {
    return { as_of: null, deficits: {} };
  }
  const deficits: Record<string, number> = {};
  if (isRecord(raw.deficits)) {
    for (const [key, value] of Object.entries(raw.deficits)) {
      const n = coerceNumber(value);
      if (n !== null && n >= 0) deficits[key] = n;
    }
  }
  return { as_of: coerceYMD(raw.as_of), deficits };
}

/** A bare plant name means open ground. */
function readPlantUnit(entry: unknown): PlantUnit | null {
  if (typeof entry === "string") {
    const plant = entry.trim();
    return plant ? { plant, mode: "open_ground" } : null;
  }
  if (!isRecord(entry) || typeof entry.plant !== "string" || !entry.plant.trim()) {
    return null;
  }
  const mode = entry.mode ?? "open_ground";
  if (!isCultivationMode(mode)) return null;
  return { plant: entry.plant.trim(), mode };
}

function readLocation(raw: unknown): GardenLocation {
  if (typeof raw === "string") {
    return { name: raw.trim() };
  }
  if (!isRecord(raw)) {
    return { name: "" };
  }
  const location: GardenLocation = { name: typeof raw.name === "string" ? raw.name.trim() : "" };
  const latitude = coerceNumber(raw.latitude);
  const longitude = coerceNumber(raw.longitude);
  if (latitude !== null && longitude !== null) {
    location.latitude = latitude;
    location.longitude = longitude;
  }
  return location;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
