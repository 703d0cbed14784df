import { describe, expect, it } from "vitest";

import {
  DEFAULT_INSIGHT_THRESHOLDS,
  DISCLAIMER_TEXT,
  evaluateInsights,
  leaderboardsByRole,
  resolveThresholds,
  type InsightInputs
} from "../insights";
import type { AggregateStats } from "../types";
import { TF_1D, TF_1W, leaderboard, record } from "./fixtures";

function stats(breadthPct: number | null, gainers: number, evaluated: number): AggregateStats {
  return {
    timeframe: "1d",
    tracked: evaluated,
    evaluated,
    gainers,
    losers: evaluated - gainers,
    unchanged: 0,
    breadthPct
  };
}

const ruleIds = (inputs: InsightInputs) => evaluateInsights(inputs).map((i) => i.ruleId);

describe("evaluateInsights", () => {
  it("returns only the disclaimer when nothing is available", () => {
    expect(evaluateInsights({ leaderboards: {} })).toEqual([
      { ruleId: "disclaimer", severity: "info", text: DISCLAIMER_TEXT }
    ]);
  });

  it("reports strong momentum for the overall leader", () => {
    const inputs: InsightInputs = {
      leaderboards: {
        topOverall: leaderboard("topOverall", TF_1D, [record("ALPHA", { "1d": 4.2 }), record("BETA", { "1d": 1 })])
      }
    };
    const insights = evaluateInsights(inputs);

    expect(insights.filter((i) => i.text.includes("+4.20%"))).toHaveLength(1);
    expect(insights[0]).toEqual({
      ruleId: "strongMomentum",
      severity: "positive",
      text: "Strong momentum: ALPHA led gainers with +4.20% over 1 Day."
    });
    expect(insights.map((i) => i.ruleId)).toEqual(["strongMomentum", "disclaimer"]);
  });

  it("requires momentum strictly above the threshold", () => {
    expect(
      ruleIds({ leaderboards: { topOverall: leaderboard("topOverall", TF_1D, [record("A", { "1d": 3 })]) } })
    ).toEqual(["disclaimer"]);
  });

  it("skips rules whose leaderboards are empty", () => {
    expect(
      ruleIds({
        leaderboards: {
          topOverall: leaderboard("topOverall", TF_1D, []),
          indices: leaderboard("indices", TF_1W, [])
        }
      })
    ).toEqual(["disclaimer"]);
  });

  it("reports the sharpest decline and wide dispersion", () => {
    const insights = evaluateInsights({
      leaderboards: {
        topOverall: leaderboard("topOverall", TF_1D, [record("A", { "1d": 5 })]),
        bottomOverall: leaderboard("bottomOverall", TF_1D, [record("D", { "1d": -4.3 }), record("C", { "1d": -0.5 })], "losers")
      }
    });

    expect(insights.map((i) => i.ruleId)).toEqual(["strongMomentum", "sharpDecline", "wideDispersion", "disclaimer"]);
    expect(insights[1].text).toBe("Sharp decline: D fell -4.30% over 1 Day.");
    expect(insights[2].text).toBe(
      "Wide dispersion: 9.30 percentage points between A (+5.00%) and D (-4.30%) over 1 Day."
    );
  });

  it("reports breadth against the stats timeframe label", () => {
    expect(evaluateInsights({ leaderboards: {}, stats: stats(65, 13, 20), timeframes: [TF_1D] })[0].text).toBe(
      "Broad rally: 65.00% of evaluated instruments advanced over 1 Day (13 of 20)."
    );
    expect(evaluateInsights({ leaderboards: {}, stats: stats(30, 3, 10) })[0].text).toBe(
      "Weak breadth: only 30.00% of evaluated instruments advanced over 1d (3 of 10)."
    );
    expect(ruleIds({ leaderboards: {}, stats: stats(50, 5, 10) })).toEqual(["disclaimer"]);
    expect(ruleIds({ leaderboards: {}, stats: stats(null, 0, 0) })).toEqual(["disclaimer"]);
  });

  it("reports commodity and index moves with display names", () => {
    const insights = evaluateInsights({
      leaderboards: {
        topCommodities: leaderboard("topCommodities", TF_1W, [record("GC=F", { "1w": 2.5 }, { name: "Gold" })]),
        indices: leaderboard("indices", TF_1W, [
          record("^NSEI", { "1w": 2.1 }, { name: "NIFTY" }),
          record("^BSESN", { "1w": -1.8 }, { name: "SENSEX" })
        ])
      }
    });

    expect(insights.map((i) => i.text)).toEqual([
      "Commodities: Gold (GC=F) led with +2.50% over 1 Week.",
      "Index strength: NIFTY (^NSEI) gained +2.10% over 1 Week.",
      "Index weakness: SENSEX (^BSESN) fell -1.80% over 1 Week.",
      DISCLAIMER_TEXT
    ]);
  });

  it("adds small-cap outperformance without disturbing the other insights", () => {
    const base: InsightInputs = {
      leaderboards: {
        topOverall: leaderboard("topOverall", TF_1D, [record("L1", { "1d": 3.5 })]),
        topLargeCap: leaderboard("topLargeCap", TF_1D, [record("L1", { "1d": 3.5 })])
      },
      stats: stats(70, 7, 10),
      timeframes: [TF_1D]
    };
    const withSmall: InsightInputs = {
      ...base,
      leaderboards: {
        ...base.leaderboards,
        topSmallCap: leaderboard("topSmallCap", TF_1D, [record("S1", { "1d": 6 }, { group: "smallCap" })])
      }
    };

    const without = evaluateInsights(base);
    const withIt = evaluateInsights(withSmall);

    expect(without.map((i) => i.ruleId)).toEqual(["strongMomentum", "broadRally", "disclaimer"]);
    expect(withIt.map((i) => i.ruleId)).toEqual(["strongMomentum", "broadRally", "smallCapOutperformance", "disclaimer"]);
    expect(withIt.filter((i) => i.ruleId !== "smallCapOutperformance")).toEqual(without);
    expect(withIt[2].text).toBe("Small caps outperformed: S1 +6.00% vs large-cap leader L1 +3.50% over 1 Day.");
  });

  it("ignores small caps ranked on a different timeframe", () => {
    expect(
      ruleIds({
        leaderboards: {
          topLargeCap: leaderboard("topLargeCap", TF_1D, [record("L1", { "1d": 1 })]),
          topSmallCap: leaderboard("topSmallCap", TF_1W, [record("S1", { "1w": 9 })])
        }
      })
    ).toEqual(["disclaimer"]);
  });

  it("applies threshold overrides", () => {
    const inputs: InsightInputs = {
      leaderboards: { topOverall: leaderboard("topOverall", TF_1D, [record("A", { "1d": 4.2 })]) }
    };
    expect(evaluateInsights(inputs, resolveThresholds({ momentumPct: 5 })).map((i) => i.ruleId)).toEqual(["disclaimer"]);
    expect(evaluateInsights(inputs, resolveThresholds({ momentumPct: 4 })).map((i) => i.ruleId)).toEqual([
      "strongMomentum",
      "disclaimer"
    ]);
  });

  it("is deterministic", () => {
    const inputs: InsightInputs = {
      leaderboards: {
        topOverall: leaderboard("topOverall", TF_1D, [record("A", { "1d": 12 })]),
        bottomOverall: leaderboard("bottomOverall", TF_1D, [record("B", { "1d": -6 })], "losers")
      },
      stats: stats(20, 2, 10)
    };
    expect(evaluateInsights(inputs)).toEqual(evaluateInsights(inputs));
  });
});

describe("resolveThresholds", () => {
  it("merges overrides onto the defaults", () => {
    expect(resolveThresholds({ dispersionPct: 10 })).toEqual({ ...DEFAULT_INSIGHT_THRESHOLDS, dispersionPct: 10 });
  });
});

describe("leaderboardsByRole", () => {
  it("indexes leaderboards by role", () => {
    const top = leaderboard("topOverall", TF_1D, []);
    expect(leaderboardsByRole([top])).toEqual({ topOverall: top });
  });
});
