import { describe, it, expect } from "vitest";
import { estimateReferenceEt0, kmhToMs } from "../evapotranspiration";

describe("estimateReferenceEt0", () => {
  it("matches reference values rounded to two decimals", () => {
    expect(estimateReferenceEt0({ tempC: 25, radiationMj: 20, windMs: kmhToMs(10) })).toBe(2.91);
    expect(estimateReferenceEt0({ tempC: 20, radiationMj: 15, windMs: 2 })).toBe(2.02);
  });

  it("is zero without radiation or wind", () => {
    expect(estimateReferenceEt0({ tempC: -5, radiationMj: 0, windMs: 0 })).toBe(0);
  });

  it("rises with radiation", () => {
    const low = estimateReferenceEt0({ tempC: 22, radiationMj: 10, windMs: 2 });
    const high = estimateReferenceEt0({ tempC: 22, radiationMj: 25, windMs: 2 });
    expect(high).toBeGreaterThan(low);
  });

  it("converts km/h to m/s", () => {
    expect(kmhToMs(36)).toBe(10);
  });
});
