import { roundHalfUp } from "./changes";
import type { ChartDefinition } from "./config";
import { universeInstruments } from "./config";
import { tailBars } from "./series";
import type { PriceSeries, Universe } from "./types";

const LINE_COLORS = ["#2563eb", "#d97706", "#059669", "#dc2626", "#7c3aed", "#0891b2", "#be185d", "#4b5563"] as const;

export type ChartLine = {
  symbol: string;
  name: string;
  color: string;
};

export type ChartRow = {
  date: string;
  /** Close rebased to 100 at the first plotted bar, keyed by symbol. */
  values: Record<string, number | null>;
};

export type ChartData = {
  id: string;
  title: string;
  lines: ChartLine[];
  rows: ChartRow[];
};

/**
* Rebases each symbol's trailing closes to 100 so instruments priced in single digits and in
* thousands share one axis. Dates are the union across symbols; a symbol without a bar on a
* date gets `null` there.
*/
export function buildChartData(
  def: ChartDefinition,
  universe: Universe,
  seriesBySymbol: ReadonlyMap<string, PriceSeries>
): ChartData {
  const lines: ChartLine[] = [];
  const valuesByDate = new Map<string, Record<string, number | null>>();

  for (const instrument of universeInstruments(universe, def.groups)) {
    const series = seriesBySymbol.get(instrument.symbol);
    if (!series) {
      continue;
    }

    const bars = tailBars(series, def.bars);
    const base = bars[0]?.close;
    if (base === undefined || base === 0) {
      continue;
    }

    lines.push({
      symbol: instrument.symbol,
      name: instrument.name,
      color: LINE_COLORS[lines.length % LINE_COLORS.length]
    });

    for (const bar of bars) {
      let values = valuesByDate.get(bar.date);
      if (!values) {
        values = {};
        valuesByDate.set(bar.date, values);
      }
      values[instrument.symbol] = roundHalfUp((bar.close / base) * 100);
    }
  }

  const rows = Array.from(valuesByDate.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, values]) => {
      const complete: Record<string, number | null> = {};
      for (const line of lines) {
        complete[line.symbol] = values[line.symbol] ?? null;
      }
      return { date, values: complete };
    });

  return { id: def.id, title: def.title, lines, rows };
}
