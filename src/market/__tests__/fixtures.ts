import { parseIsoDate, shiftIsoDate } from "../../lib/date";
import { createPriceSeries } from "../series";
import type { Leaderboard, PerformanceRecord, PriceBar, PriceSeries, Timeframe } from "../types";

export const TF_1D: Timeframe = { id: "1d", label: "1 Day", bars: 1 };
export const TF_1W: Timeframe = { id: "1w", label: "1 Week", bars: 5 };

/** Weekdays starting at `start` (2024-01-01 is a Monday). */
export function tradingDates(start: string, count: number): string[] {
  const out: string[] = [];
  let date = start;
  while (out.length < count) {
    const day = parseIsoDate(date).getUTCDay();
    if (day !== 0 && day !== 6) {
      out.push(date);
    }
    date = shiftIsoDate(date, 1);
  }
  return out;
}

export function bar(date: string, close: number): PriceBar {
  return { date, open: close, high: close, low: close, close, volume: 1000 };
}

export function seriesFromCloses(symbol: string, closes: number[], start = "2024-01-01"): PriceSeries {
  const dates = tradingDates(start, closes.length);
  return createPriceSeries(
    symbol,
    closes.map((close, i) => bar(dates[i], close))
  );
}

export function record(
  symbol: string,
  changes: Record<string, number | null>,
  extra: { name?: string; group?: string; currentPrice?: number | null } = {}
): PerformanceRecord {
  return {
    symbol,
    name: extra.name ?? symbol,
    group: extra.group ?? "largeCap",
    currentPrice: extra.currentPrice === undefined ? 100 : extra.currentPrice,
    changes
  };
}

export function leaderboard(
  role: string,
  timeframe: Timeframe,
  entries: PerformanceRecord[],
  direction: Leaderboard["direction"] = "gainers"
): Leaderboard {
  return { role, title: role, timeframe, direction, entries };
}
