import bundledAdvice from "./advice.json";
import { logger } from "../utils/logger";
import type { MonthlyAdvice, MonthlyAdviceBook } from "./types";

export function defaultAdviceBook(): MonthlyAdviceBook {
  return parseAdviceBook(bundledAdvice);
}

/** Keys are month numbers ("1" to "12"); malformed months are skipped. */
export function parseAdviceBook(data: unknown): MonthlyAdviceBook {
  const book: MonthlyAdviceBook = {};
  if (!isRecord(data)) {
    logger.warn("Monthly advice ignored: expected a mapping");
    return book;
  }
  for (const [key, entry] of Object.entries(data)) {
    const month = Number(key);
    if (!Number.isInteger(month) || month < 1 || month > 12 || !isRecord(entry) || !Array.isArray(entry.tips)) {
      logger.warn("Monthly advice entry skipped", { month: key });
      continue;
    }
    const tips = entry.tips.filter((tip): tip is string => typeof tip === "string" && tip.trim().length > 0);
    book[month] = {
      month,
      title: typeof entry.title === "string" && entry.title.trim() ? entry.title.trim() : `Month ${month}`,
      tips,
    };
  }
  return book;
}

export function monthlyAdvice(month: number, book: MonthlyAdviceBook = defaultAdviceBook()): MonthlyAdvice | null {
  return book[month] ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
