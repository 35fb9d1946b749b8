import { describe, it, expect } from "vitest";
import {
  createEmptyJournal,
  normaliseJournal,
  readMowingEntry,
  readWateringEntry,
  recordMowing,
  recordWatering,
  serialiseJournal,
} from "../journal";

const options = { defaultPlants: ["Tomate", "Basilic"], defaultCutHeightCm: 5 };

describe("journal", () => {
  describe("readWateringEntry", () => {
    it("tags bare dates and structured records", () => {
      expect(readWateringEntry("2024-06-01")).toEqual({ kind: "bare-date", date: "2024-06-01" });
      expect(readWateringEntry({ date: "2024-06-02", plants: ["Tomate", 3, " "] })).toEqual({
        kind: "record",
        date: "2024-06-02",
        plants: ["Tomate"],
      });
      expect(readWateringEntry({ date: "2024-06-03" })).toEqual({ kind: "record", date: "2024-06-03", plants: null });
      expect(readWateringEntry({ plants: ["Tomate"] })).toBeNull();
      expect(readWateringEntry("yesterday")).toBeNull();
    });
  });

  describe("readMowingEntry", () => {
    it("keeps the latest date of a list and reads the older height key", () => {
      expect(readMowingEntry({ date: ["2024-05-01", "2024-05-20", "2024-05-10"], hauteur: "4.5" })).toEqual({
        kind: "record",
        date: "2024-05-20",
        height_cm: 4.5,
      });
    });

    it("rejects negative heights and bad dates", () => {
      expect(readMowingEntry({ date: "2024-05-01", height_cm: -1 })).toBeNull();
      expect(readMowingEntry({ date: ["2024-05-01", "soon"], height_cm: 5 })).toBeNull();
      expect(readMowingEntry("2024-05-01")).toBeNull();
    });
  });

  describe("normaliseJournal", () => {
    it("folds every stored shape into events", () => {
      const { journal, warnings } = normaliseJournal(
        {
          watering: [
            { date: "2024-06-03", plants: ["Tomate"] },
            "2024-06-01",
            { when: "2024-06-02" },
          ],
          mowing: [{ date: "2024-05-30" }, { date: "2024-05-20", height_cm: 6 }],
        },
        options,
      );
      expect(journal).toEqual({
        watering: [
          { date: "2024-06-01", plants: ["Tomate", "Basilic"] },
          { date: "2024-06-03", plants: ["Tomate"] },
        ],
        mowing: [
          { date: "2024-05-20", height_cm: 6 },
          { date: "2024-05-30", height_cm: 5 },
        ],
      });
      expect(warnings).toEqual(['Malformed watering entry skipped: {"when":"2024-06-02"}']);
    });

    it("accepts the older list names", () => {
      const { journal } = normaliseJournal({ arrosages: ["2024-06-01"], tontes: [] }, options);
      expect(journal.watering).toHaveLength(1);
    });

    it("returns an empty journal for a missing document", () => {
      expect(normaliseJournal(null, options)).toEqual({ journal: createEmptyJournal(), warnings: [] });
      expect(normaliseJournal("oops", options).warnings).toEqual(['Journal ignored: expected a mapping, got "oops"']);
    });
  });

  describe("appends", () => {
    it("returns a new journal with the event added", () => {
      const empty = createEmptyJournal();
      const watered = recordWatering(empty, "2024-06-01", ["Tomate", " Tomate ", "Basilic"]);
      expect(empty.watering).toEqual([]);
      expect(watered.watering).toEqual([{ date: "2024-06-01", plants: ["Tomate", "Basilic"] }]);

      const mowed = recordMowing(watered, "2024-06-02", 4);
      expect(mowed.mowing).toEqual([{ date: "2024-06-02", height_cm: 4 }]);
      expect(mowed.watering).toEqual(watered.watering);
    });

    it("rejects invalid input", () => {
      expect(() => recordWatering(createEmptyJournal(), "2024-02-30", ["Tomate"])).toThrow(
        "Invalid watering date 2024-02-30",
      );
      expect(() => recordWatering(createEmptyJournal(), "2024-06-01", [" "])).toThrow(
        "Select at least one plant to record a watering",
      );
      expect(() => recordMowing(createEmptyJournal(), "2024-06-01", -2)).toThrow("Invalid cut height -2");
    });
  });

  it("serialises to plain records", () => {
    const journal = recordWatering(createEmptyJournal(), "2024-06-01", ["Tomate"]);
    expect(serialiseJournal(journal)).toEqual({ watering: [{ date: "2024-06-01", plants: ["Tomate"] }], mowing: [] });
  });
});
