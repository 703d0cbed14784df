import { roundHalfUp } from "./changes";
import { formatPct, formatSignedPct } from "./format";
import type { AggregateStats, Insight, InsightSeverity, Leaderboard, PerformanceRecord, Timeframe } from "./types";
import { LEADERBOARD_ROLES } from "./types";

export type InsightThresholds = {
  /** Overall leader must gain more than this. */
  momentumPct: number;
  /** Overall laggard must lose more than this (compared as a negative move). */
  declinePct: number;
  broadRallyBreadthPct: number;
  weakBreadthPct: number;
  commodityMovePct: number;
  /** Small-cap leader must beat the large-cap leader by more than this many points. */
  smallCapSpreadPct: number;
  indexMovePct: number;
  /** Points between the overall leader and laggard. */
  dispersionPct: number;
};

export const DEFAULT_INSIGHT_THRESHOLDS: InsightThresholds = {
  momentumPct: 3,
  declinePct: 3,
  broadRallyBreadthPct: 60,
  weakBreadthPct: 40,
  commodityMovePct: 2,
  smallCapSpreadPct: 1,
  indexMovePct: 1.5,
  dispersionPct: 8
};

export const INSIGHT_THRESHOLD_KEYS = [
  "momentumPct",
  "declinePct",
  "broadRallyBreadthPct",
  "weakBreadthPct",
  "commodityMovePct",
  "smallCapSpreadPct",
  "indexMovePct",
  "dispersionPct"
] as const satisfies ReadonlyArray<keyof InsightThresholds>;

export const DISCLAIMER_TEXT =
  "This report is generated automatically from historical price data for informational purposes only and is not investment advice. Past performance does not guarantee future results.";

export type InsightInputs = {
  leaderboards: Readonly<Partial<Record<string, Leaderboard>>>;
  stats?: AggregateStats | null;
  /** Used to label the stats timeframe; falls back to its id. */
  timeframes?: readonly Timeframe[];
};

export type InsightRule = {
  id: string;
  evaluate(inputs: InsightInputs, thresholds: InsightThresholds): Insight | null;
};

type Ranked = { record: PerformanceRecord; change: number };

function usable(lb: Leaderboard | undefined): lb is Leaderboard {
  return lb !== undefined && lb.entries.length > 0;
}

function extreme(lb: Leaderboard, pick: "max" | "min"): Ranked | null {
  let best: Ranked | null = null;
  for (const record of lb.entries) {
    const change = record.changes[lb.timeframe.id];
    if (typeof change !== "number" || !Number.isFinite(change)) {
      continue;
    }
    if (best === null || (pick === "max" ? change > best.change : change < best.change)) {
      best = { record, change };
    }
  }
  return best;
}

function displayName(record: PerformanceRecord): string {
  return record.name === record.symbol ? record.symbol : `${record.name} (${record.symbol})`;
}

function statsLabel(inputs: InsightInputs, stats: AggregateStats): string {
  return inputs.timeframes?.find((tf) => tf.id === stats.timeframe)?.label ?? stats.timeframe;
}

function insight(ruleId: string, severity: InsightSeverity, text: string): Insight {
  return { ruleId, severity, text };
}

export const INSIGHT_RULES: readonly InsightRule[] = [
  {
    id: "strongMomentum",
    evaluate(inputs, t) {
      const lb = inputs.leaderboards[LEADERBOARD_ROLES.topOverall];
      if (!usable(lb)) {
        return null;
      }
      const leader = extreme(lb, "max");
      if (!leader || !(leader.change > t.momentumPct)) {
        return null;
      }
      return insight(
        "strongMomentum",
        "positive",
        `Strong momentum: ${displayName(leader.record)} led gainers with ${formatSignedPct(leader.change)} over ${lb.timeframe.label}.`
      );
    }
  },
  {
    id: "sharpDecline",
    evaluate(inputs, t) {
      const lb = inputs.leaderboards[LEADERBOARD_ROLES.bottomOverall];
      if (!usable(lb)) {
        return null;
      }
      const laggard = extreme(lb, "min");
      if (!laggard || !(laggard.change < -t.declinePct)) {
        return null;
      }
      return insight(
        "sharpDecline",
        "warning",
        `Sharp decline: ${displayName(laggard.record)} fell ${formatSignedPct(laggard.change)} over ${lb.timeframe.label}.`
      );
    }
  },
  {
    id: "broadRally",
    evaluate(inputs, t) {
      const stats = inputs.stats;
      if (!stats || stats.breadthPct === null || stats.breadthPct < t.broadRallyBreadthPct) {
        return null;
      }
      return insight(
        "broadRally",
        "positive",
        `Broad rally: ${formatPct(stats.breadthPct)} of evaluated instruments advanced over ${statsLabel(inputs, stats)} (${stats.gainers} of ${stats.evaluated}).`
      );
    }
  },
  {
    id: "weakBreadth",
    evaluate(inputs, t) {
      const stats = inputs.stats;
      if (!stats || stats.breadthPct === null || stats.breadthPct > t.weakBreadthPct) {
        return null;
      }
      return insight(
        "weakBreadth",
        "warning",
        `Weak breadth: only ${formatPct(stats.breadthPct)} of evaluated instruments advanced over ${statsLabel(inputs, stats)} (${stats.gainers} of ${stats.evaluated}).`
      );
    }
  },
  {
    id: "commodityLeader",
    evaluate(inputs, t) {
      const lb = inputs.leaderboards[LEADERBOARD_ROLES.topCommodities];
      if (!usable(lb)) {
        return null;
      }
      const leader = extreme(lb, "max");
      if (!leader || leader.change < t.commodityMovePct) {
        return null;
      }
      return insight(
        "commodityLeader",
        "info",
        `Commodities: ${displayName(leader.record)} led with ${formatSignedPct(leader.change)} over ${lb.timeframe.label}.`
      );
    }
  },
  {
    id: "smallCapOutperformance",
    evaluate(inputs, t) {
      const small = inputs.leaderboards[LEADERBOARD_ROLES.topSmallCap];
      const large = inputs.leaderboards[LEADERBOARD_ROLES.topLargeCap];
      if (!usable(small) || !usable(large) || small.timeframe.id !== large.timeframe.id) {
        return null;
      }
      const smallLeader = extreme(small, "max");
      const largeLeader = extreme(large, "max");
      if (!smallLeader || !largeLeader || !(smallLeader.change - largeLeader.change > t.smallCapSpreadPct)) {
        return null;
      }
      return insight(
        "smallCapOutperformance",
        "positive",
        `Small caps outperformed: ${displayName(smallLeader.record)} ${formatSignedPct(smallLeader.change)} vs large-cap leader ${displayName(largeLeader.record)} ${formatSignedPct(largeLeader.change)} over ${small.timeframe.label}.`
      );
    }
  },
  {
    id: "indexStrength",
    evaluate(inputs, t) {
      const lb = inputs.leaderboards[LEADERBOARD_ROLES.indices];
      if (!usable(lb)) {
        return null;
      }
      const best = extreme(lb, "max");
      if (!best || best.change < t.indexMovePct) {
        return null;
      }
      return insight(
        "indexStrength",
        "positive",
        `Index strength: ${displayName(best.record)} gained ${formatSignedPct(best.change)} over ${lb.timeframe.label}.`
      );
    }
  },
  {
    id: "indexWeakness",
    evaluate(inputs, t) {
      const lb = inputs.leaderboards[LEADERBOARD_ROLES.indices];
      if (!usable(lb)) {
        return null;
      }
      const worst = extreme(lb, "min");
      if (!worst || worst.change > -t.indexMovePct) {
        return null;
      }
      return insight(
        "indexWeakness",
        "warning",
        `Index weakness: ${displayName(worst.record)} fell ${formatSignedPct(worst.change)} over ${lb.timeframe.label}.`
      );
    }
  },
  {
    id: "wideDispersion",
    evaluate(inputs, t) {
      const top = inputs.leaderboards[LEADERBOARD_ROLES.topOverall];
      const bottom = inputs.leaderboards[LEADERBOARD_ROLES.bottomOverall];
      if (!usable(top) || !usable(bottom) || top.timeframe.id !== bottom.timeframe.id) {
        return null;
      }
      const leader = extreme(top, "max");
      const laggard = extreme(bottom, "min");
      if (!leader || !laggard) {
        return null;
      }
      const spread = roundHalfUp(leader.change - laggard.change);
      if (!(spread > t.dispersionPct)) {
        return null;
      }
      return insight(
        "wideDispersion",
        "warning",
        `Wide dispersion: ${spread.toFixed(2)} percentage points between ${displayName(leader.record)} (${formatSignedPct(leader.change)}) and ${displayName(laggard.record)} (${formatSignedPct(laggard.change)}) over ${top.timeframe.label}.`
      );
    }
  },
  {
    id: "disclaimer",
    evaluate() {
      return insight("disclaimer", "info", DISCLAIMER_TEXT);
    }
  }
];

export function resolveThresholds(overrides: Partial<InsightThresholds> = {}): InsightThresholds {
  return { ...DEFAULT_INSIGHT_THRESHOLDS, ...overrides };
}

/**
* Evaluates every rule in priority order. Rules never see each other's output, and a rule whose
* leaderboards are missing or empty is skipped. The disclaimer is always the last insight.
*/
export function evaluateInsights(
  inputs: InsightInputs,
  thresholds: InsightThresholds = DEFAULT_INSIGHT_THRESHOLDS
): Insight[] {
  const out: Insight[] = [];
  for (const rule of INSIGHT_RULES) {
    const hit = rule.evaluate(inputs, thresholds);
    if (hit) {
      out.push(hit);
    }
  }
  return out;
}

export function leaderboardsByRole(leaderboards: readonly Leaderboard[]): Partial<Record<string, Leaderboard>> {
  const out: Partial<Record<string, Leaderboard>> = {};
  for (const lb of leaderboards) {
    out[lb.role] = lb;
  }
  return out;
}
