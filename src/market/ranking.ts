import { roundHalfUp } from "./changes";
import { InvalidArgumentError } from "./errors";
import type {
  AggregateStats,
  Leaderboard,
  LeaderboardSpec,
  PerformanceRecord,
  RankDirection,
  Timeframe
} from "./types";

export type RankOptions = {
  timeframe: string;
  direction: RankDirection;
  limit: number;
  /** Applied to the fully ranked pool, so group rankings agree with the overall ranking. */
  filter?: (record: PerformanceRecord) => boolean;
};

type Evaluated = { record: PerformanceRecord; change: number };

function compareSymbols(a: string, b: string): number {
  // Code-unit order; `localeCompare` would make ties depend on the host locale.
  return a < b ? -1 : a > b ? 1 : 0;
}

function evaluatedFor(records: readonly PerformanceRecord[], timeframe: string): Evaluated[] {
  const out: Evaluated[] = [];
  for (const record of records) {
    const change = record.changes[timeframe];
    if (typeof change === "number" && Number.isFinite(change)) {
      out.push({ record, change });
    }
  }
  return out;
}

/**
* Every evaluated record for `timeframe` in rank order, without truncation.
*/
export function rankPool(
  records: readonly PerformanceRecord[],
  timeframe: string,
  direction: RankDirection
): PerformanceRecord[] {
  const factor = direction === "gainers" ? -1 : 1;
  return evaluatedFor(records, timeframe)
    .sort((a, b) => factor * (a.change - b.change) || compareSymbols(a.record.symbol, b.record.symbol))
    .map((e) => e.record);
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError(`limit must be a non-negative integer, got ${limit}`);
  }
}

function takeRanked(
  ranked: readonly PerformanceRecord[],
  limit: number,
  filter?: (record: PerformanceRecord) => boolean
): PerformanceRecord[] {
  const pool = filter ? ranked.filter(filter) : ranked;
  return pool.slice(0, limit);
}

export function rank(records: readonly PerformanceRecord[], opts: RankOptions): PerformanceRecord[] {
  assertLimit(opts.limit);
  return takeRanked(rankPool(records, opts.timeframe, opts.direction), opts.limit, opts.filter);
}

export function inGroups(groups: readonly string[]): (record: PerformanceRecord) => boolean {
  if (groups.length === 0) {
    return () => true;
  }

  const set = new Set(groups);
  return (record) => set.has(record.group);
}

/**
* Builds every configured leaderboard in configured order. Each (timeframe, direction) pool is ranked
* once and shared, so overlapping leaderboards read the same ordering.
*/
export function buildLeaderboards(
  records: readonly PerformanceRecord[],
  specs: readonly LeaderboardSpec[],
  timeframes: readonly Timeframe[]
): Leaderboard[] {
  const timeframeById = new Map(timeframes.map((tf) => [tf.id, tf]));
  const pools = new Map<string, PerformanceRecord[]>();

  return specs.map((spec) => {
    const timeframe = timeframeById.get(spec.timeframe);
    if (!timeframe) {
      throw new InvalidArgumentError(`leaderboard ${spec.role} references unknown timeframe: ${spec.timeframe}`);
    }
    assertLimit(spec.limit);

    const key = `${spec.timeframe}:${spec.direction}`;
    let ranked = pools.get(key);
    if (!ranked) {
      ranked = rankPool(records, spec.timeframe, spec.direction);
      pools.set(key, ranked);
    }

    return {
      role: spec.role,
      title: spec.title,
      timeframe,
      direction: spec.direction,
      entries: Object.freeze(takeRanked(ranked, spec.limit, inGroups(spec.groups)))
    };
  });
}

/**
* Share of evaluated records with a positive change, in [0, 1]. `null` when nothing was
* evaluated.
*/
export function computeBreadth(records: readonly PerformanceRecord[], timeframe: string): number | null {
  const evaluated = evaluatedFor(records, timeframe);
  if (evaluated.length === 0) {
    return null;
  }

  return evaluated.filter((e) => e.change > 0).length / evaluated.length;
}

export function computeAggregateStats(records: readonly PerformanceRecord[], timeframe: string): AggregateStats {
  const evaluated = evaluatedFor(records, timeframe);
  const gainers = evaluated.filter((e) => e.change > 0).length;
  const losers = evaluated.filter((e) => e.change < 0).length;
  const breadth = computeBreadth(records, timeframe);

  return {
    timeframe,
    tracked: records.length,
    evaluated: evaluated.length,
    gainers,
    losers,
    unchanged: evaluated.length - gainers - losers,
    breadthPct: breadth === null ? null : roundHalfUp(breadth * 100)
  };
}
