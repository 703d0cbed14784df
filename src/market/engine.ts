import { buildPerformanceRecord, computeRollingChanges } from "./changes";
import type { ReportConfig } from "./config";
import { universeInstruments } from "./config";
import { errorMessage } from "./errors";
import { evaluateInsights, leaderboardsByRole } from "./insights";
import { buildLeaderboards, computeAggregateStats, inGroups } from "./ranking";
import { emptySeries } from "./series";
import type { EngineOutput, IndexComparison, PerformanceRecord, PriceSeries, Universe } from "./types";

export type EngineConfig = Pick<ReportConfig, "timeframes" | "leaderboards" | "stats" | "insights" | "indexComparison">;

/**
* One batch pass: records per instrument, leaderboards, stats, insights, index comparisons.
*
* Pure apart from logging skipped instruments. A symbol with no entry in `seriesBySymbol` is
* treated like an empty fetch.
*/
export function runPerformanceEngine(args: {
  universe: Universe;
  seriesBySymbol: ReadonlyMap<string, PriceSeries>;
  config: EngineConfig;
}): EngineOutput {
  const { universe, seriesBySymbol, config } = args;
  const instruments = universeInstruments(universe);
  const seriesFor = (symbol: string) => seriesBySymbol.get(symbol) ?? emptySeries(symbol);

  const records: PerformanceRecord[] = [];
  for (const instrument of instruments) {
    try {
      records.push(buildPerformanceRecord(instrument, seriesFor(instrument.symbol), config.timeframes));
    } catch (error) {
      console.error(`[market:engine] skipped ${instrument.symbol}: ${errorMessage(error)}`);
    }
  }

  const leaderboards = buildLeaderboards(records, config.leaderboards, config.timeframes);
  const stats = computeAggregateStats(records.filter(inGroups(config.stats.groups)), config.stats.timeframe);
  const insights = evaluateInsights(
    { leaderboards: leaderboardsByRole(leaderboards), stats, timeframes: config.timeframes },
    config.insights.thresholds
  );

  const indexComparisons: IndexComparison[] = [];
  if (config.indexComparison) {
    const { groups, offsetBars, rows } = config.indexComparison;
    for (const instrument of universeInstruments(universe, groups)) {
      indexComparisons.push({
        symbol: instrument.symbol,
        name: instrument.name,
        offsetBars,
        rows: computeRollingChanges(seriesFor(instrument.symbol), offsetBars, rows)
      });
    }
  }

  const missingSymbols = instruments
    .map((i) => i.symbol)
    .filter((symbol) => seriesFor(symbol).bars.length === 0)
    .sort();

  return {
    timeframes: config.timeframes,
    records,
    leaderboards,
    stats,
    insights,
    indexComparisons,
    missingSymbols
  };
}
