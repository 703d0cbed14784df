import { settleWithConcurrency } from "./concurrency";
import { errorMessage } from "./errors";
import { emptySeries } from "./series";
import type { Instrument, PriceDataProvider, PriceSeries, SeriesRange } from "./types";

export type CollectedSeries = {
  seriesBySymbol: Map<string, PriceSeries>;
  /** Symbols whose fetch failed or came back empty, sorted. */
  missingSymbols: string[];
  failedSymbols: string[];
};

/**
* Fetches every instrument once. A failed fetch is logged and stands in as an empty series, so
* the engine sees the whole universe whatever subset of fetches succeeded.
*/
export async function collectSeries(
  provider: PriceDataProvider,
  instruments: readonly Instrument[],
  opts: { range: SeriesRange; concurrency: number }
): Promise<CollectedSeries> {
  const symbols = Array.from(new Set(instruments.map((i) => i.symbol)));

  const settled = await settleWithConcurrency(symbols, opts.concurrency, (symbol) =>
    provider.fetchSeries(symbol, opts.range)
  );

  const seriesBySymbol = new Map<string, PriceSeries>();
  const failedSymbols: string[] = [];
  for (const result of settled) {
    if (result.status === "fulfilled") {
      seriesBySymbol.set(result.item, result.value);
      continue;
    }

    console.error(`[market:data] failed for ${result.item}: ${errorMessage(result.reason)}`);
    failedSymbols.push(result.item);
    seriesBySymbol.set(result.item, emptySeries(result.item));
  }

  const missingSymbols = symbols.filter((s) => (seriesBySymbol.get(s)?.bars.length ?? 0) === 0).sort();

  return { seriesBySymbol, missingSymbols, failedSymbols: failedSymbols.sort() };
}
