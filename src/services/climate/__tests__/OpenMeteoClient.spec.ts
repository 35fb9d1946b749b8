import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OpenMeteoClient, decodeDaily } from "../OpenMeteoClient";
import { MemoryCache } from "../../storage/MemoryCache";

const dailyPayload = {
  daily: {
    time: ["2024-06-01", "2024-06-02", "2024-06-03"],
    temperature_2m_max: [22, 25, null],
    precipitation_sum: [0, 3.5, 1],
    shortwave_radiation_sum: [18, 20, 15],
    windspeed_10m_max: [10, 10, 8],
    et0_fao_evapotranspiration: [3.1, null, null],
  },
};

describe("OpenMeteoClient", () => {
  let http: { get: ReturnType<typeof vi.fn> };
  let client: OpenMeteoClient;

  beforeEach(() => {
    http = { get: vi.fn() };
    client = new OpenMeteoClient(http, new MemoryCache());
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("getDailyWeather", () => {
    it("requests the daily fields and fills in missing ET0", async () => {
      http.get.mockResolvedValueOnce({ data: dailyPayload });

      const result = await client.getDailyWeather(45.76, 4.84, { pastDays: 7, forecastDays: 14 });

      expect(http.get).toHaveBeenCalledWith("https://api.open-meteo.com/v1/forecast", {
        params: {
          latitude: 45.76,
          longitude: 4.84,
          daily: "temperature_2m_max,precipitation_sum,shortwave_radiation_sum,windspeed_10m_max,et0_fao_evapotranspiration",
          past_days: 7,
          forecast_days: 14,
          timezone: "Europe/Paris",
        },
      });
      expect(result.series).toEqual([
        { date: "2024-06-01", temp_max: 22, rain_mm: 0, et0_mm: 3.1, wind_kmh: 10, radiation_mj: 18 },
        { date: "2024-06-02", temp_max: 25, rain_mm: 3.5, et0_mm: 2.91, wind_kmh: 10, radiation_mj: 20 },
        { date: "2024-06-03", temp_max: 0, rain_mm: 1, et0_mm: 0, wind_kmh: 8, radiation_mj: 15 },
      ]);
      expect(result.warnings).toEqual(["1 weather record(s) had missing values replaced by 0"]);
    });

    it("serves a repeated request from the cache", async () => {
      http.get.mockResolvedValueOnce({ data: dailyPayload });
      const first = await client.getDailyWeather(45.76, 4.84);
      const second = await client.getDailyWeather(45.76, 4.84);
      expect(second).toEqual(first);
      expect(http.get).toHaveBeenCalledTimes(1);
    });

    it("returns an empty series with a warning when the request fails", async () => {
      http.get.mockRejectedValueOnce(new Error("Network Error"));
      expect(await client.getDailyWeather(45.76, 4.84)).toEqual({
        series: [],
        warnings: ["Weather data unavailable: Network Error"],
      });
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("rejects a response without a daily block", async () => {
      http.get.mockResolvedValueOnce({ data: { hourly: {} } });
      expect(await client.getDailyWeather(45.76, 4.84)).toEqual({
        series: [],
        warnings: ["Weather data unavailable: unexpected response format"],
      });
    });
  });

  describe("geocode", () => {
    it("returns the first match and caches it", async () => {
      http.get.mockResolvedValueOnce({
        data: { results: [{ name: "Lyon", country: "France", latitude: 45.75, longitude: 4.85 }] },
      });
      const place = await client.geocode(" Lyon ");
      expect(place).toEqual({ name: "Lyon", country: "France", latitude: 45.75, longitude: 4.85 });
      expect(http.get).toHaveBeenCalledWith("https://geocoding-api.open-meteo.com/v1/search", {
        params: { name: "Lyon", count: 1, language: "fr", format: "json" },
      });
      expect(await client.geocode("lyon")).toEqual(place);
      expect(http.get).toHaveBeenCalledTimes(1);
    });

    it("returns null for no match, an empty name or an error", async () => {
      http.get.mockResolvedValueOnce({ data: { generationtime_ms: 0.2 } });
      expect(await client.geocode("Nowhere")).toBeNull();
      expect(await client.geocode("  ")).toBeNull();
      http.get.mockRejectedValueOnce(new Error("timeout"));
      expect(await client.geocode("Lyon")).toBeNull();
    });
  });
});

describe("decodeDaily", () => {
  it("uses zero ET0 when radiation is missing", () => {
    const rows = decodeDaily({ daily: { time: ["2024-06-01"], temperature_2m_max: [20] } });
    expect(rows).toEqual([
      { date: "2024-06-01", temp_max: 20, rain_mm: null, et0_mm: 0, wind_kmh: null, radiation_mj: null },
    ]);
  });
});
