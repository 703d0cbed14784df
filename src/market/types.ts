export const RANK_DIRECTIONS = ["gainers", "losers"] as const;

export type RankDirection = (typeof RANK_DIRECTIONS)[number];

export const INSIGHT_SEVERITIES = ["info", "positive", "warning"] as const;

export type InsightSeverity = (typeof INSIGHT_SEVERITIES)[number];

/**
* Leaderboard roles the insight rules know how to read.
*
* Leaderboards configured under other roles are still rendered, but no rule looks at them.
*/
export const LEADERBOARD_ROLES = {
  topOverall: "topOverall",
  bottomOverall: "bottomOverall",
  topCommodities: "topCommodities",
  topLargeCap: "topLargeCap",
  topSmallCap: "topSmallCap",
  indices: "indices"
} as const;

export type PriceBar = {
  /** Session date, YYYY-MM-DD. */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number | null;
};

/**
* Daily bars for one symbol, ascending by date with no duplicate dates.
*
* An empty `bars` array is a valid series (failed or empty fetch).
*/
export type PriceSeries = {
  readonly symbol: string;
  readonly bars: readonly PriceBar[];
};

/**
* A named lookback counted in trading bars, not calendar days.
*/
export type Timeframe = {
  id: string;
  label: string;
  bars: number;
};

export type Instrument = {
  symbol: string;
  name: string;
  group: string;
};

export type InstrumentGroup = {
  id: string;
  label: string;
  instruments: Instrument[];
};

export type Universe = {
  groups: InstrumentGroup[];
};

/**
* Percentage changes are rounded to 2 decimals. `null` means unavailable: empty or short
* history, or a zero reference price.
*/
export type PerformanceRecord = {
  readonly symbol: string;
  readonly name: string;
  readonly group: string;
  readonly currentPrice: number | null;
  readonly changes: Readonly<Record<string, number | null>>;
};

export type ChangeResult = {
  currentPrice: number | null;
  pctChange: number | null;
};

export type LeaderboardSpec = {
  role: string;
  title: string;
  /** Empty means every group in the universe. */
  groups: string[];
  timeframe: string;
  direction: RankDirection;
  limit: number;
};

export type Leaderboard = {
  role: string;
  title: string;
  timeframe: Timeframe;
  direction: RankDirection;
  entries: readonly PerformanceRecord[];
};

export type AggregateStats = {
  timeframe: string;
  /** Every instrument in the pool, evaluated or not. */
  tracked: number;
  evaluated: number;
  gainers: number;
  losers: number;
  unchanged: number;
  /** Share of evaluated instruments with a positive change, in percent. */
  breadthPct: number | null;
};

export type Insight = {
  ruleId: string;
  severity: InsightSeverity;
  text: string;
};

export type RollingChange = {
  date: string;
  weekday: string;
  pctChange: number | null;
};

export type IndexComparison = {
  symbol: string;
  name: string;
  offsetBars: number;
  rows: RollingChange[];
};

export type EngineOutput = {
  timeframes: Timeframe[];
  records: PerformanceRecord[];
  leaderboards: Leaderboard[];
  stats: AggregateStats;
  insights: Insight[];
  indexComparisons: IndexComparison[];
  missingSymbols: string[];
};

export type SeriesRange = {
  /** Inclusive as-of date, YYYY-MM-DD. Defaults to now. */
  end?: string;
  /** Explicit start date, YYYY-MM-DD. Takes precedence over `lookbackDays`. */
  start?: string;
  /** Calendar days before `end` to request when `start` is absent. */
  lookbackDays: number;
};

export interface PriceDataProvider {
  fetchSeries(symbol: string, range: SeriesRange): Promise<PriceSeries>;
}

export type ReportDocument = {
  subject: string;
  html: string;
};

export interface ReportDelivery {
  send(document: ReportDocument): Promise<void>;
}
