import { describe, it, expect } from "vitest";
import { exportJournalToCSV, formatGardenReport, formatJournalHistory } from "../exporters";
import type { GardenReport } from "../../features/gardenCycle";

const report: GardenReport = {
  asOf: "2024-06-05",
  soil: "Sableux",
  mulched: true,
  thresholdMm: 15,
  units: [
    {
      unit: { plant: "Tomate", mode: "container" },
      key: "Tomate@container",
      family: "solanacees",
      deficit: 18,
      classification: { needsWater: true, status: "action-required", reason: "Deficit: 18.0 mm" },
    },
    {
      unit: { plant: "Haricot vert", mode: "open_ground" },
      key: "Haricot vert@open_ground",
      family: "fabacees",
      deficit: 2,
      classification: { needsWater: false, status: "negligible", reason: "Negligible deficit: 2.0 mm" },
    },
  ],
  familyDeficits: { solanacees: 18, fabacees: 2 },
  unitsToWater: 1,
  nextWateringDate: null,
  lawn: { heightCm: 6.24, since: "2024-06-01", targetHeightCm: 5, mowNow: false, nextMowDate: "2024-06-09" },
  rain: { next24h: 0, next48h: 3.25 },
  alerts: [{ kind: "heat", message: "Heat alert: 2 day(s) at or above 30 °C in the next 48 h; water in the evening" }],
  advice: { month: 6, title: "June", tips: ["Water in the evening.", "Raise the mowing height."] },
  warnings: [],
  state: { as_of: "2024-06-05", deficits: { "Tomate@container": 18, "Haricot vert@open_ground": 2 } },
};

describe("exporters", () => {
  it("formats the garden report", () => {
    expect(formatGardenReport(report).split("\n")).toEqual([
      "Garden report for 2024-06-05",
      "Soil: Sableux (mulched), watering threshold 15.0 mm",
      "Rain forecast: 0.0 mm in 24 h, 3.3 mm in 48 h",
      "",
      "Plants:",
      "- Tomate (container) [WATER] Deficit: 18.0 mm",
      "- Haricot vert (open_ground) [ok] Negligible deficit: 2.0 mm",
      "Next watering: today, 1 plant(s) to water",
      "",
      "Lawn: 6.2 cm (growth counted since 2024-06-01), target 5.0 cm",
      "Next mow: 2024-06-09",
      "",
      "Advice for June:",
      "- Water in the evening.",
      "- Raise the mowing height.",
      "",
      "Alerts:",
      "- Heat alert: 2 day(s) at or above 30 °C in the next 48 h; water in the evening",
    ]);
  });

  it("lists warnings and the empty plant case", () => {
    const text = formatGardenReport({ ...report, units: [], alerts: [], warnings: ["No usable garden location"] });
    const lines = text.split("\n");
    expect(lines[4]).toBe("Plants: none tracked");
    expect(lines.slice(-2)).toEqual(["Warnings:", "- No usable garden location"]);
  });

  it("announces a mow today and the next watering date when nothing is dry", () => {
    const text = formatGardenReport({
      ...report,
      unitsToWater: 0,
      nextWateringDate: "2024-06-07",
      lawn: { ...report.lawn, heightCm: 8, mowNow: true, nextMowDate: "2024-06-06" },
      alerts: [],
      advice: null,
    });
    expect(text.split("\n").slice(7)).toEqual([
      "Next watering: 2024-06-07",
      "",
      "Lawn: 8.0 cm (growth counted since 2024-06-01), target 5.0 cm",
      "Next mow: today, the lawn is overgrown",
      "",
      "No garden advice for this month",
    ]);
  });

  it("exports the journal as CSV in date order", () => {
    const csv = exportJournalToCSV({
      watering: [
        { date: "2024-06-03", plants: ["Tomate", "Haricot vert"] },
        { date: "2024-06-01", plants: ['Salade "feuille de chêne", rouge'] },
      ],
      mowing: [{ date: "2024-06-02", height_cm: 4.5 }],
    });
    expect(csv.split("\n")).toEqual([
      "Date,Activity,Plants,Height (cm)",
      '2024-06-01,watering,"Salade ""feuille de chêne"", rouge",',
      "2024-06-02,mowing,,4.5",
      "2024-06-03,watering,Tomate|Haricot vert,",
    ]);
  });

  it("formats journal statistics and the timeline", () => {
    const text = formatJournalHistory(
      {
        watering: { count: 3, meanIntervalDays: 3.5, lastDate: "2024-06-08" },
        mowing: { count: 0, meanIntervalDays: null, lastDate: null, meanHeightCm: null },
      },
      [
        { date: "2024-06-07", activity: "none" },
        { date: "2024-06-08", activity: "watered" },
      ],
    );
    expect(text.split("\n")).toEqual([
      "Watering: 3 event(s), every 3.5 day(s), last 2024-06-08",
      "Mowing: 0 event(s), every n/a, last never, mean height n/a",
      "",
      "2024-06-07 .",
      "2024-06-08 watered",
    ]);
  });
});
