import { describe, expect, it } from "vitest";

import { resolveChartWindow, toPriceBars } from "../providers/yahoo";

describe("toPriceBars", () => {
  it("maps quotes and skips sessions without a close", () => {
    const bars = toPriceBars([
      { date: new Date("2024-01-08T03:45:00.000Z"), open: 10, high: 12, low: 9, close: 11, volume: 1500 },
      { date: new Date("2024-01-09T03:45:00.000Z"), open: null, high: null, low: null, close: 11.5, volume: null },
      { date: new Date("2024-01-10T03:45:00.000Z"), close: null },
      { date: "2024-01-11", close: 12 },
      { date: new Date("not a date"), close: 12 }
    ]);

    expect(bars).toEqual([
      { date: "2024-01-08", open: 10, high: 12, low: 9, close: 11, volume: 1500 },
      { date: "2024-01-09", open: 11.5, high: 11.5, low: 11.5, close: 11.5, volume: null }
    ]);
  });
});

describe("resolveChartWindow", () => {
  it("counts the lookback back from the end date and includes the end session", () => {
    expect(resolveChartWindow({ end: "2024-01-31", lookbackDays: 30 })).toEqual({
      period1: new Date("2024-01-01T00:00:00.000Z"),
      period2: new Date("2024-02-01T00:00:00.000Z")
    });
  });

  it("prefers an explicit start", () => {
    expect(resolveChartWindow({ start: "2024-01-10", end: "2024-01-12", lookbackDays: 30 }).period1).toEqual(
      new Date("2024-01-10T00:00:00.000Z")
    );
  });

  it("rejects a start after the end", () => {
    expect(() => resolveChartWindow({ start: "2024-02-10", end: "2024-01-12", lookbackDays: 30 })).toThrow(
      "Invalid range: start 2024-02-10 is after end 2024-01-12"
    );
  });
});
