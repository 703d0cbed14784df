import YahooFinance from "yahoo-finance2";

import { getTodayDateString, parseIsoDate, shiftIsoDate } from "../../lib/date";
import { createPriceSeries, emptySeries } from "../series";
import type { PriceBar, PriceDataProvider, PriceSeries, SeriesRange } from "../types";

/**
* The fields we read from a `chart()` quote. Everything is checked at runtime because the
* provider returns `null` for sessions it has no print for.
*/
export type ChartQuoteLike = {
  date?: unknown;
  open?: unknown;
  high?: unknown;
  low?: unknown;
  close?: unknown;
  volume?: unknown;
};

function finite(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function toPriceBars(quotes: readonly ChartQuoteLike[]): PriceBar[] {
  const bars: PriceBar[] = [];

  for (const q of quotes) {
    if (!(q.date instanceof Date) || !Number.isFinite(q.date.getTime())) {
      continue;
    }

    const close = finite(q.close);
    if (close === null) {
      continue;
    }

    // Indices and some futures report no open/high/low on thin sessions; fall back to close.
    bars.push({
      date: q.date.toISOString().slice(0, 10),
      open: finite(q.open) ?? close,
      high: finite(q.high) ?? close,
      low: finite(q.low) ?? close,
      close,
      volume: finite(q.volume)
    });
  }

  return bars;
}

/**
* Resolves a range into the `[period1, period2)` window Yahoo expects. `period2` is the day
* after `end` so the as-of session itself is included.
*/
export function resolveChartWindow(range: SeriesRange, timeZone?: string): { period1: Date; period2: Date } {
  const end = range.end ?? getTodayDateString(timeZone);
  const start = range.start ?? shiftIsoDate(end, -range.lookbackDays);

  const period1 = parseIsoDate(start);
  const period2 = parseIsoDate(shiftIsoDate(end, 1));
  if (period1.getTime() >= period2.getTime()) {
    throw new Error(`Invalid range: start ${start} is after end ${end}`);
  }

  return { period1, period2 };
}

export class YahooPriceDataProvider implements PriceDataProvider {
  readonly #yf: InstanceType<typeof YahooFinance>;
  readonly #timeZone: string | undefined;

  constructor(opts: { timeZone?: string } = {}) {
    this.#yf = new YahooFinance();
    this.#timeZone = opts.timeZone;
  }

  async fetchSeries(symbol: string, range: SeriesRange): Promise<PriceSeries> {
    const { period1, period2 } = resolveChartWindow(range, this.#timeZone);

    const res = await this.#yf.chart(symbol, { interval: "1d", period1, period2 });
    if (!Array.isArray(res.quotes) || res.quotes.length === 0) {
      return emptySeries(symbol);
    }

    return createPriceSeries(symbol, toPriceBars(res.quotes));
  }
}
