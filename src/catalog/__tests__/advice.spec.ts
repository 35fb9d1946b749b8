import { afterEach, describe, expect, it, vi } from "vitest";
import { defaultAdviceBook, monthlyAdvice, parseAdviceBook } from "..";

describe("monthly advice", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("ships advice for every month", () => {
    const book = defaultAdviceBook();
    expect(Object.keys(book)).toHaveLength(12);
    expect(monthlyAdvice(6)?.title).toBe("June");
    expect(monthlyAdvice(6)?.tips[0]).toBe("Water in the evening and at the foot of the plants.");
    expect(monthlyAdvice(13)).toBeNull();
  });

  it("skips malformed months and blank tips", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const book = parseAdviceBook({
      "3": { tips: ["Sow peas.", "  ", 4] },
      "14": { title: "Nope", tips: [] },
      "5": "water",
    });
    expect(book).toEqual({ 3: { month: 3, title: "Month 3", tips: ["Sow peas."] } });
    expect(monthlyAdvice(5, book)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("returns an empty book for a non-mapping", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseAdviceBook(["June"])).toEqual({});
  });
});
