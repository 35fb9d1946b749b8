import type { GardenReport } from "../features/gardenCycle";
import type { JournalStats, TimelineDay } from "../features/calendar";
import type { GardenJournal } from "../types";

export function formatGardenReport(report: GardenReport): string {
  const lines: string[] = [];
  lines.push(`Garden report for ${report.asOf}`);
  lines.push(
    `Soil: ${report.soil}${report.mulched ? " (mulched)" : ""}, watering threshold ${formatNumber(report.thresholdMm)} mm`,
  );
  lines.push(`Rain forecast: ${formatNumber(report.rain.next24h)} mm in 24 h, ${formatNumber(report.rain.next48h)} mm in 48 h`);
  lines.push("");
  if (report.units.length) {
    lines.push("Plants:");
    for (const item of report.units) {
      const action = item.classification.needsWater ? "WATER" : "ok";
      lines.push(`- ${item.unit.plant} (${item.unit.mode}) [${action}] ${item.classification.reason}`);
    }
  } else {
    lines.push("Plants: none tracked");
  }
  if (report.unitsToWater > 0) {
    lines.push(`Next watering: today, ${report.unitsToWater} plant(s) to water`);
  } else {
    lines.push(`Next watering: ${report.nextWateringDate ?? "not needed within the forecast window"}`);
  }
  lines.push("");
  lines.push(
    `Lawn: ${formatNumber(report.lawn.heightCm)} cm (growth counted since ${report.lawn.since}), target ${formatNumber(report.lawn.targetHeightCm)} cm`,
  );
  if (report.lawn.mowNow) {
    lines.push("Next mow: today, the lawn is overgrown");
  } else {
    lines.push(`Next mow: ${report.lawn.nextMowDate ?? "not needed within the forecast window"}`);
  }
  lines.push("");
  if (report.advice && report.advice.tips.length) {
    lines.push(`Advice for ${report.advice.title}:`);
    for (const tip of report.advice.tips) {
      lines.push(`- ${tip}`);
    }
  } else {
    lines.push("No garden advice for this month");
  }
  if (report.alerts.length) {
    lines.push("");
    lines.push("Alerts:");
    for (const alert of report.alerts) {
      lines.push(`- ${alert.message}`);
    }
  }
  if (report.warnings.length) {
    lines.push("");
    lines.push("Warnings:");
    for (const warning of report.warnings) {
      lines.push(`- ${warning}`);
    }
  }
  return lines.join("\n");
}

export function formatJournalHistory(stats: JournalStats, timeline: ReadonlyArray<TimelineDay>): string {
  const lines: string[] = [];
  lines.push(
    `Watering: ${stats.watering.count} event(s), every ${formatInterval(stats.watering.meanIntervalDays)}, last ${stats.watering.lastDate ?? "never"}`,
  );
  const meanHeight = stats.mowing.meanHeightCm === null ? "n/a" : `${formatNumber(stats.mowing.meanHeightCm)} cm`;
  lines.push(
    `Mowing: ${stats.mowing.count} event(s), every ${formatInterval(stats.mowing.meanIntervalDays)}, last ${stats.mowing.lastDate ?? "never"}, mean height ${meanHeight}`,
  );
  lines.push("");
  for (const day of timeline) {
    lines.push(`${day.date} ${TIMELINE_MARKS[day.activity]}`);
  }
  return lines.join("\n");
}

const TIMELINE_MARKS: Record<TimelineDay["activity"], string> = {
  watered: "watered",
  mowed: "mowed",
  none: ".",
};

export function exportJournalToCSV(journal: GardenJournal): string {
  const rows: string[][] = [];
  rows.push(["Date", "Activity", "Plants", "Height (cm)"]);
  const entries: string[][] = [
    ...journal.watering.map((event) => [event.date, "watering", event.plants.join("|"), ""]),
    ...journal.mowing.map((event) => [event.date, "mowing", "", formatNumber(event.height_cm)]),
  ];
  entries.sort((a, b) => a[0].localeCompare(b[0]));
  rows.push(...entries);
  return rows.map((row) => row.map(escapeCsv).join(",")).join("\n");
}

function formatInterval(days: number | null): string {
  return days === null ? "n/a" : `${days.toFixed(1)} day(s)`;
}

function escapeCsv(value: string): string {
  if (value.includes(",") || value.includes("\"") || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return "0.0";
  }
  return value.toFixed(1);
}
