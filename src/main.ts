#!/usr/bin/env node
import { parseArgs } from "node:util";
import { join } from "node:path";
import { CatalogUnavailableError, listCatalogPlants, loadCatalog } from "./catalog";
import type { GardenCatalog } from "./catalog";
import { DEFAULT_SETTINGS, applyEnvironment, coerceNumber } from "./settings";
import type { GardenPreferences, GardenSettings, WeatherDay, Ymd } from "./types";
import { GardenStore, STORE_FILES } from "./features/store";
import type { JournalNormaliseOptions } from "./features/journal";
import { runGardenCycle } from "./features/gardenCycle";
import { buildActivityTimeline, computeJournalStats } from "./features/calendar";
import { defaultCutHeight } from "./logic/growth";
import { OpenMeteoClient } from "./services/climate/OpenMeteoClient";
import { todayYMD } from "./utils/dates";
import { exportJournalToCSV, formatGardenReport, formatJournalHistory } from "./utils/exporters";
import { logger } from "./utils/logger";
import { ensureFile } from "./yamlIO";

const USAGE = `Usage: garden-balance <command> [options]

Commands:
  report               fetch the weather, update the garden state and print advice
  water [plants...]    record a watering today (every tracked plant by default)
  mow [height_cm]      record a mowing today (last cut height by default)
  history [--csv]      journal statistics and the last 14 days
  plants               plant names known to the catalog

Environment:
  GARDEN_DATA_DIR      folder holding settings.yaml, preferences.yaml, journal.yaml
  GARDEN_CATALOG       plant catalog JSON replacing the bundled one
  GARDEN_LOG_LEVEL     debug | info | warn | error`;

const PREFERENCES_TEMPLATE = `# Tracked plants: a bare name is grown in open ground.
units:
  - Tomate
  - plant: Basilic
    mode: container
soil_type: Limoneux
mulched: false
location:
  name: Lyon
target_height_cm: 5
`;

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  store?: GardenStore;
  client?: OpenMeteoClient;
  today?: Ymd;
  output?: CliOutput;
}

interface CliContext {
  settings: GardenSettings;
  store: GardenStore;
  client: OpenMeteoClient;
  today: Ymd;
  output: CliOutput;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: false,
    options: { csv: { type: "boolean" }, help: { type: "boolean", short: "h" } },
  });
  const [command, ...rest] = positionals;
  if (values.help === true || command === undefined || command === "help") {
    output.out(USAGE);
    return command === undefined && values.help !== true ? 1 : 0;
  }

  const env = deps.env ?? process.env;
  const bootstrap = applyEnvironment(DEFAULT_SETTINGS, env);
  const store = deps.store ?? GardenStore.forDirectory(bootstrap.data_dir);
  const ctx: CliContext = {
    settings: applyEnvironment(await store.loadSettings(), env),
    store,
    client: deps.client ?? new OpenMeteoClient(),
    today: deps.today ?? todayYMD(),
    output,
  };

  try {
    switch (command) {
      case "report":
        return await reportCommand(ctx, deps.store === undefined ? bootstrap.data_dir : null);
      case "water":
        return await waterCommand(ctx, rest);
      case "mow":
        return await mowCommand(ctx, rest[0]);
      case "history":
        return await historyCommand(ctx, values.csv === true);
      case "plants":
        ctx.output.out(listCatalogPlants(await loadCatalog(ctx.settings.catalog_path)).join("\n"));
        return 0;
      default:
        output.err(`Unknown command: ${command}`);
        output.err(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof CatalogUnavailableError) {
      logger.error("Cannot run without the plant catalog", { path: ctx.settings.catalog_path }, error);
      output.err(error.message);
      return 1;
    }
    if (error instanceof Error) {
      output.err(error.message);
      return 1;
    }
    throw error;
  }
}

async function reportCommand(ctx: CliContext, dataDir: string | null): Promise<number> {
  const catalog: GardenCatalog = await loadCatalog(ctx.settings.catalog_path);
  const { preferences, warnings } = await ctx.store.loadPreferences();
  if (!preferences.units.length) {
    if (dataDir) {
      const path = join(dataDir, STORE_FILES.preferences);
      await ensureFile(path, PREFERENCES_TEMPLATE);
      ctx.output.err(`No tracked plants. Edit ${path} and run the report again.`);
    } else {
      ctx.output.err("No tracked plants.");
    }
    return 1;
  }

  const journalResult = await ctx.store.loadJournal(journalOptions(ctx.settings, preferences));
  const weather = await fetchWeather(ctx, preferences);
  const report = runGardenCycle({
    today: ctx.today,
    settings: ctx.settings,
    preferences,
    catalog,
    journal: journalResult.journal,
    weather: weather.series,
    warnings: [...warnings, ...journalResult.warnings, ...weather.warnings],
  });
  await ctx.store.saveState(report.state);
  ctx.output.out(formatGardenReport(report));
  return 0;
}

async function waterCommand(ctx: CliContext, plants: string[]): Promise<number> {
  const { preferences } = await ctx.store.loadPreferences();
  const options = journalOptions(ctx.settings, preferences);
  const selected = plants.length ? plants : options.defaultPlants;
  if (!selected.length) {
    ctx.output.err("No plant given and no tracked plants to water.");
    return 1;
  }
  await ctx.store.appendWatering(ctx.today, selected, options);
  ctx.output.out(`Watering recorded on ${ctx.today}: ${selected.join(", ")}`);
  return 0;
}

async function mowCommand(ctx: CliContext, heightArg: string | undefined): Promise<number> {
  const { preferences } = await ctx.store.loadPreferences();
  const options = journalOptions(ctx.settings, preferences);
  let height: number;
  if (heightArg === undefined) {
    const { journal } = await ctx.store.loadJournal(options);
    height = defaultCutHeight(journal.mowing, ctx.settings.default_cut_height_cm);
  } else {
    const parsed = coerceNumber(heightArg);
    if (parsed === null || parsed < 0) {
      ctx.output.err(`Invalid cut height: ${heightArg}`);
      return 1;
    }
    height = parsed;
  }
  await ctx.store.appendMowing(ctx.today, height, options);
  ctx.output.out(`Mowing recorded on ${ctx.today} at ${height} cm`);
  return 0;
}

async function historyCommand(ctx: CliContext, csv: boolean): Promise<number> {
  const { preferences } = await ctx.store.loadPreferences();
  const { journal } = await ctx.store.loadJournal(journalOptions(ctx.settings, preferences));
  if (csv) {
    ctx.output.out(exportJournalToCSV(journal));
    return 0;
  }
  ctx.output.out(formatJournalHistory(computeJournalStats(journal), buildActivityTimeline(journal, ctx.today)));
  return 0;
}

async function fetchWeather(
  ctx: CliContext,
  preferences: GardenPreferences,
): Promise<{ series: WeatherDay[]; warnings: string[] }> {
  let { latitude, longitude } = preferences.location;
  if (latitude === undefined || longitude === undefined) {
    const place = preferences.location.name ? await ctx.client.geocode(preferences.location.name) : null;
    if (!place) {
      return { series: [], warnings: ["No usable garden location; weather data unavailable"] };
    }
    latitude = place.latitude;
    longitude = place.longitude;
  }
  return ctx.client.getDailyWeather(latitude, longitude, {
    pastDays: ctx.settings.weather.past_days,
    forecastDays: ctx.settings.weather.forecast_days,
    timezone: ctx.settings.weather.timezone,
  });
}

function journalOptions(settings: GardenSettings, preferences: GardenPreferences): JournalNormaliseOptions {
  return {
    defaultPlants: [...new Set(preferences.units.map((unit) => unit.plant))],
    defaultCutHeightCm: settings.default_cut_height_cm,
  };
}

if (typeof require !== "undefined" && require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error("garden-balance failed", {}, error);
      process.exitCode = 1;
    },
  );
}
