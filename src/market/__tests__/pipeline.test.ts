import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parseReportConfig, parseUniverse } from "../config";
import { DeliveryError } from "../errors";
import { runMarketReport } from "../pipeline";
import type { PriceDataProvider, ReportDelivery, ReportDocument } from "../types";
import { seriesFromCloses } from "./fixtures";

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

const universe = parseUniverse({
  groups: [
    { id: "largeCap", instruments: ["A", "B"] },
    { id: "indices", instruments: [{ symbol: "^NSEI", name: "NIFTY" }] }
  ]
});

const config = parseReportConfig({
  timeframes: [{ id: "1d", label: "1 Day", bars: 1 }],
  leaderboards: [
    { role: "topOverall", groups: ["largeCap"], timeframe: "1d", direction: "gainers", limit: 10 },
    { role: "indices", groups: ["indices"], timeframe: "1d", direction: "gainers", limit: 5 }
  ],
  stats: { groups: ["largeCap"] },
  report: { title: "Test Report" }
});

const provider: PriceDataProvider = {
  async fetchSeries(symbol) {
    if (symbol === "B") {
      throw new Error("timeout");
    }
    return seriesFromCloses(symbol, [100, 105]);
  }
};

function recordingDelivery() {
  const sent: ReportDocument[] = [];
  const delivery: ReportDelivery = {
    async send(doc) {
      sent.push(doc);
    }
  };
  return { sent, delivery };
}

describe("runMarketReport", () => {
  it("delivers the rendered report and summarizes the run", async () => {
    const { sent, delivery } = recordingDelivery();

    const res = await runMarketReport({ date: "2024-01-12" }, { universe, config, provider, delivery });

    expect(res).toEqual({
      date: "2024-01-12",
      tracked: 2,
      evaluated: 1,
      missingSymbols: ["B"],
      failedSymbols: ["B"],
      leaderboards: { topOverall: 1, indices: 1 },
      insights: 4,
      delivered: true,
      wroteFile: null
    });
    expect(sent).toHaveLength(1);
    expect(sent[0].subject).toBe("📊 Test Report: 2024-01-12");
    expect(sent[0].html).toContain("Strong momentum: A led gainers with +5.00% over 1 Day.");
  });

  it("skips delivery on a dry run", async () => {
    const { sent, delivery } = recordingDelivery();

    const res = await runMarketReport({ date: "2024-01-12", dryRun: true }, { universe, config, provider, delivery });

    expect(res.delivered).toBe(false);
    expect(sent).toEqual([]);
  });

  it("fails the run when delivery fails", async () => {
    const delivery: ReportDelivery = {
      async send() {
        throw new DeliveryError("[market:email] Send failed: HTTP 500 ", 500);
      }
    };

    await expect(runMarketReport({ date: "2024-01-12" }, { universe, config, provider, delivery })).rejects.toBeInstanceOf(
      DeliveryError
    );
  });

  it("rejects a config that references groups the universe lacks", async () => {
    const bad = parseReportConfig({
      timeframes: [{ id: "1d", bars: 1 }],
      leaderboards: [{ role: "topSmallCap", groups: ["smallCap"], timeframe: "1d", direction: "gainers", limit: 5 }]
    });

    await expect(
      runMarketReport({ date: "2024-01-12", dryRun: true }, { universe, config: bad, provider })
    ).rejects.toThrow("leaderboards.topSmallCap.groups references unknown group: smallCap");
  });
});
