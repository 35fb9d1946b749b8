import axios, { type AxiosInstance } from "axios";
import { coerceNumber } from "../../settings";
import { estimateReferenceEt0, kmhToMs } from "../../logic/evapotranspiration";
import { type NormalisedSeries, normaliseWeatherSeries } from "../../logic/weatherSeries";
import { logger } from "../../utils/logger";
import { MemoryCache } from "../storage/MemoryCache";

const FORECAST_URL = "https://api.open-meteo.com/v1/forecast";
const GEOCODING_URL = "https://geocoding-api.open-meteo.com/v1/search";
const DAILY_FIELDS = [
  "temperature_2m_max",
  "precipitation_sum",
  "shortwave_radiation_sum",
  "windspeed_10m_max",
  "et0_fao_evapotranspiration",
].join(",");

const WEATHER_TTL_MS = 1000 * 60 * 60;
const GEOCODE_TTL_MS = 1000 * 60 * 60 * 24;

export interface GeocodedPlace {
  name: string;
  country: string;
  latitude: number;
  longitude: number;
}

export interface DailyWeatherOptions {
  pastDays?: number;
  forecastDays?: number;
  timezone?: string;
}

export type HttpClient = Pick<AxiosInstance, "get">;

export class OpenMeteoClient {
  constructor(
    private readonly http: HttpClient = axios.create({ timeout: 10_000 }),
    private readonly cache = new MemoryCache(),
  ) {}

  async geocode(name: string): Promise<GeocodedPlace | null> {
    const query = name.trim();
    if (!query) return null;
    const cacheKey = `geocode:${query.toLowerCase()}`;
    const cached = await this.cache.get(cacheKey, isGeocodedPlace);
    if (cached) {
      return cached;
    }

    try {
      const response = await this.http.get<unknown>(GEOCODING_URL, {
        params: { name: query, count: 1, language: "fr", format: "json" },
      });
      const place = parseGeocoding(response.data);
      if (place) {
        await this.cache.set(cacheKey, place, { ttlMs: GEOCODE_TTL_MS });
      }
      return place;
    } catch (error) {
      logger.error("Open-Meteo geocoding request failed", { place: query }, error);
      return null;
    }
  }

  /**
   * Past and forecast days for one location. ET0 comes from the provider when
   * present, from `estimateReferenceEt0` otherwise. Failures yield an empty series
   * with a warning.
   */
  async getDailyWeather(
    latitude: number,
    longitude: number,
    options: DailyWeatherOptions = {},
  ): Promise<NormalisedSeries> {
    const pastDays = options.pastDays ?? 7;
    const forecastDays = options.forecastDays ?? 14;
    const timezone = options.timezone ?? "Europe/Paris";
    const cacheKey = `daily:${latitude.toFixed(2)},${longitude.toFixed(2)}:${pastDays}:${forecastDays}:${timezone}`;
    const cached = await this.cache.get(cacheKey, isNormalisedSeries);
    if (cached) {
      return cached;
    }

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(FORECAST_URL, {
        params: {
          latitude,
          longitude,
          daily: DAILY_FIELDS,
          past_days: pastDays,
          forecast_days: forecastDays,
          timezone,
        },
      });
      data = response.data;
    } catch (error) {
      logger.error("Open-Meteo forecast request failed", { latitude, longitude }, error);
      const reason = error instanceof Error ? error.message : String(error);
      return { series: [], warnings: [`Weather data unavailable: ${reason}`] };
    }

    const rows = decodeDaily(data);
    if (!rows) {
      logger.error("Open-Meteo forecast response has no daily block", { latitude, longitude });
      return { series: [], warnings: ["Weather data unavailable: unexpected response format"] };
    }
    const result = normaliseWeatherSeries(rows);
    await this.cache.set(cacheKey, result, { ttlMs: WEATHER_TTL_MS });
    return result;
  }
}

export interface DailyRow {
  date: unknown;
  temp_max: number | null;
  rain_mm: number | null;
  et0_mm: number;
  wind_kmh: number | null;
  radiation_mj: number | null;
}

export function decodeDaily(data: unknown): DailyRow[] | null {
  if (!isRecord(data) || !isRecord(data.daily)) {
    return null;
  }
  const daily = data.daily;
  const time = daily.time;
  if (!Array.isArray(time)) {
    return null;
  }
  const column = (name: string, index: number): number | null => {
    const values = daily[name];
    return Array.isArray(values) ? coerceNumber(values[index]) : null;
  };
  return time.map((date: unknown, i: number): DailyRow => {
    const temp = column("temperature_2m_max", i);
    const radiation = column("shortwave_radiation_sum", i);
    const wind = column("windspeed_10m_max", i);
    return {
      date,
      temp_max: temp,
      rain_mm: column("precipitation_sum", i),
      et0_mm: column("et0_fao_evapotranspiration", i) ?? fallbackEt0(temp, radiation, wind),
      wind_kmh: wind,
      radiation_mj: radiation,
    };
  });
}

/** Zero when any input is missing or temperature or radiation is zero. */
function fallbackEt0(temp: number | null, radiation: number | null, windKmh: number | null): number {
  if (temp === null || radiation === null || windKmh === null || temp === 0 || radiation === 0) {
    return 0;
  }
  return estimateReferenceEt0({ tempC: temp, radiationMj: radiation, windMs: kmhToMs(windKmh) });
}

function parseGeocoding(data: unknown): GeocodedPlace | null {
  if (!isRecord(data) || !Array.isArray(data.results) || !data.results.length) {
    return null;
  }
  const first: unknown = data.results[0];
  if (!isRecord(first)) return null;
  const latitude = coerceNumber(first.latitude);
  const longitude = coerceNumber(first.longitude);
  if (latitude === null || longitude === null || typeof first.name !== "string") {
    return null;
  }
  return {
    name: first.name,
    country: typeof first.country === "string" ? first.country : "",
    latitude,
    longitude,
  };
}

function isGeocodedPlace(value: unknown): value is GeocodedPlace {
  return (
    isRecord(value) &&
    typeof value.name === "string" &&
    typeof value.latitude === "number" &&
    typeof value.longitude === "number"
  );
}

function isNormalisedSeries(value: unknown): value is NormalisedSeries {
  return isRecord(value) && Array.isArray(value.series) && Array.isArray(value.warnings);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
