import { isIsoCalendarDate } from "../lib/date";

import type { PriceBar, PriceSeries } from "./types";

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
* Builds a series that upholds the ordering invariant: bars sorted by date, one bar per date
* (the last one seen wins), and no bar without a finite close.
*/
export function createPriceSeries(symbol: string, bars: readonly PriceBar[]): PriceSeries {
  const byDate = new Map<string, PriceBar>();
  for (const bar of bars) {
    if (!isIsoCalendarDate(bar.date) || !isFiniteNumber(bar.close)) {
      continue;
    }
    byDate.set(bar.date, Object.freeze({ ...bar }));
  }

  const sorted = Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  return Object.freeze({ symbol, bars: Object.freeze(sorted) });
}

export function emptySeries(symbol: string): PriceSeries {
  return createPriceSeries(symbol, []);
}

export function isEmptySeries(series: PriceSeries): boolean {
  return series.bars.length === 0;
}

export function latestClose(series: PriceSeries): number | null {
  const last = series.bars.at(-1);
  return last ? last.close : null;
}

/**
* Close `barsBack` bars before the latest one; `closeBack(series, 0)` is the latest close.
*/
export function closeBack(series: PriceSeries, barsBack: number): number | null {
  const bar = series.bars[series.bars.length - 1 - barsBack];
  return bar && barsBack >= 0 ? bar.close : null;
}

export function tailBars(series: PriceSeries, count: number): readonly PriceBar[] {
  if (count <= 0) {
    return [];
  }
  return series.bars.slice(Math.max(0, series.bars.length - count));
}
