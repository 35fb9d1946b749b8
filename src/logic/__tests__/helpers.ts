import { parseCatalog } from "../../catalog";
import type { GardenCatalog } from "../../catalog";
import type { WeatherDay, Ymd } from "../../types";
import { addDays } from "../../utils/dates";

/** Round factors so expected deficits stay exact. */
export function testCatalog(): GardenCatalog {
  return parseCatalog({
    mulch_factor: 0.5,
    container_factor: 1.5,
    soils: [
      { soil_type: "Sableux", retention_factor: 1.0, deficit_threshold_mm: 15 },
      { soil_type: "Limoneux", retention_factor: 1.0, deficit_threshold_mm: 20 },
      { soil_type: "Argileux", retention_factor: 0.5, deficit_threshold_mm: 25 },
    ],
    families: [
      { code: "legumes", label: "Légumineuses", crop_coefficient: 1.0, members: ["Haricot", "Pois"] },
      { code: "solanaceae", label: "Solanacées", crop_coefficient: 1.5, members: ["Tomate"] },
    ],
  });
}

export function weatherDays(start: Ymd, days: Array<Partial<Omit<WeatherDay, "date">>>): WeatherDay[] {
  return days.map((day, i) => ({
    date: addDays(start, i),
    temp_max: 20,
    rain_mm: 0,
    et0_mm: 0,
    ...day,
  }));
}

export function repeatDays(start: Ymd, count: number, day: Partial<Omit<WeatherDay, "date">>): WeatherDay[] {
  return weatherDays(start, Array.from({ length: count }, () => ({ ...day })));
}
