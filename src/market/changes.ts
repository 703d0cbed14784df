import { weekdayOf } from "../lib/date";

import { InvalidArgumentError } from "./errors";
import { closeBack, latestClose } from "./series";
import type { ChangeResult, Instrument, PerformanceRecord, PriceSeries, RollingChange, Timeframe } from "./types";

export const PCT_DECIMALS = 2;

/**
* Rounds half away from zero at `decimals` places.
*
* Shifting through the shortest decimal string (`"1.005e2"`) instead of multiplying keeps
* `.xx5` boundaries exact: 1.005 -> 1.01, -2.675 -> -2.68.
*/
export function roundHalfUp(value: number, decimals = PCT_DECIMALS): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const abs = Math.abs(value);
  const text = String(abs);
  let rounded: number;
  if (abs >= 1e21) {
    // Integral at this magnitude.
    rounded = abs;
  } else if (text.includes("e")) {
    const factor = 10 ** decimals;
    rounded = Math.round(abs * factor) / factor;
  } else {
    const shifted = Math.round(Number(`${text}e${decimals}`));
    rounded = Number(`${shifted}e-${decimals}`);
  }

  const signed = value < 0 ? -rounded : rounded;
  return signed === 0 ? 0 : signed;
}

export function assertOffsetBars(offsetBars: number): void {
  if (!Number.isInteger(offsetBars) || offsetBars <= 0) {
    throw new InvalidArgumentError(`offsetBars must be a positive integer, got ${offsetBars}`);
  }
}

export function percentChange(current: number, reference: number): number | null {
  if (reference === 0 || !Number.isFinite(current) || !Number.isFinite(reference)) {
    return null;
  }

  const pct = ((current - reference) / reference) * 100;
  return Number.isFinite(pct) ? roundHalfUp(pct) : null;
}

export function computeChange(series: PriceSeries, offsetBars: number): ChangeResult {
  assertOffsetBars(offsetBars);

  const currentPrice = latestClose(series);
  if (currentPrice === null) {
    return { currentPrice: null, pctChange: null };
  }

  const reference = closeBack(series, offsetBars);
  if (reference === null) {
    return { currentPrice, pctChange: null };
  }

  return { currentPrice, pctChange: percentChange(currentPrice, reference) };
}

export function buildPerformanceRecord(
  instrument: Instrument,
  series: PriceSeries,
  timeframes: readonly Timeframe[]
): PerformanceRecord {
  const changes: Record<string, number | null> = {};
  for (const tf of timeframes) {
    changes[tf.id] = computeChange(series, tf.bars).pctChange;
  }

  return Object.freeze({
    symbol: instrument.symbol,
    name: instrument.name,
    group: instrument.group,
    currentPrice: latestClose(series),
    changes: Object.freeze(changes)
  });
}

/**
* Change from each bar to the bar `offsetBars` sessions later, labeled by the later session.
*
* With 10 daily bars and an offset of 5 this yields 5 rows: this week's sessions compared with
* the same sessions a week earlier. `maxRows` keeps only the most recent rows.
*/
export function computeRollingChanges(
  series: PriceSeries,
  offsetBars: number,
  maxRows?: number
): RollingChange[] {
  assertOffsetBars(offsetBars);

  const rows: RollingChange[] = [];
  for (let i = 0; i + offsetBars < series.bars.length; i += 1) {
    const from = series.bars[i];
    const to = series.bars[i + offsetBars];
    rows.push({
      date: to.date,
      weekday: weekdayOf(to.date),
      pctChange: percentChange(to.close, from.close)
    });
  }

  if (maxRows === undefined) {
    return rows;
  }
  return maxRows > 0 ? rows.slice(-maxRows) : [];
}
