import { describe, it, expect } from "vitest";
import {
  CatalogUnavailableError,
  defaultCatalog,
  findFamilyForPlant,
  listCatalogPlants,
  loadCatalog,
  parseCatalog,
} from "..";

function rawCatalog(): Record<string, unknown> {
  return {
    mulch_factor: 0.7,
    container_factor: 1.1,
    soils: [
      { soil_type: "Sableux", retention_factor: 1.2, deficit_threshold_mm: 15 },
      { soil_type: "Limoneux", retention_factor: 1, deficit_threshold_mm: 20 },
      { soil_type: "Argileux", retention_factor: 0.8, deficit_threshold_mm: 25 },
    ],
    families: [{ code: "legumes", crop_coefficient: 1, members: ["Haricot", "Pois"] }],
  };
}

describe("catalog", () => {
  it("ships the bundled families and soils", () => {
    const catalog = defaultCatalog();
    expect(catalog.soils.Sableux).toEqual({ soil_type: "Sableux", retention_factor: 1.2, deficit_threshold_mm: 15 });
    expect(catalog.mulch_factor).toBe(0.7);
    expect(catalog.container_factor).toBe(1.1);
    expect(findFamilyForPlant(catalog, "tomate")?.code).toBe("solanacees");
    expect(findFamilyForPlant(catalog, "Basilic")?.crop_coefficient).toBe(0.7);
    expect(findFamilyForPlant(catalog, "Gazon")).toBeUndefined();
  });

  it("lists plants alphabetically", () => {
    expect(listCatalogPlants(parseCatalog(rawCatalog()))).toEqual(["Haricot", "Pois"]);
  });

  it("uses the code as label when none is given", () => {
    expect(parseCatalog(rawCatalog()).families.legumes.label).toBe("legumes");
  });

  it("rejects a plant listed in two families", () => {
    const raw = rawCatalog();
    raw.families = [
      { code: "legumes", crop_coefficient: 1, members: ["Haricot"] },
      { code: "autres", crop_coefficient: 1, members: ["haricot"] },
    ];
    expect(() => parseCatalog(raw)).toThrow("reference data unavailable: plant haricot listed in legumes and autres");
  });

  it("rejects missing soils and bad coefficients", () => {
    const noClay = rawCatalog();
    noClay.soils = [
      { soil_type: "Sableux", retention_factor: 1.2, deficit_threshold_mm: 15 },
      { soil_type: "Limoneux", retention_factor: 1, deficit_threshold_mm: 20 },
    ];
    expect(() => parseCatalog(noClay)).toThrow("missing soil profiles: Argileux");

    const badKc = rawCatalog();
    badKc.families = [{ code: "legumes", crop_coefficient: 0, members: [] }];
    expect(() => parseCatalog(badKc)).toThrow("legumes.crop_coefficient must be a positive number");
    expect(() => parseCatalog([])).toThrow(CatalogUnavailableError);
  });

  it("fails with CatalogUnavailableError on an unreadable file", async () => {
    await expect(loadCatalog("/nonexistent/garden-catalog.json")).rejects.toBeInstanceOf(CatalogUnavailableError);
  });

  it("returns the bundled catalog without a path", async () => {
    expect(Object.keys((await loadCatalog()).families)).toContain("alliacees");
  });
});
