import { describe, expect, it } from "vitest";

import { closeBack, createPriceSeries, emptySeries, isEmptySeries, latestClose, tailBars } from "../series";
import { bar, seriesFromCloses } from "./fixtures";

describe("createPriceSeries", () => {
  it("sorts bars by date", () => {
    const series = createPriceSeries("AAA", [bar("2024-01-03", 3), bar("2024-01-01", 1), bar("2024-01-02", 2)]);
    expect(series.bars.map((b) => b.date)).toEqual(["2024-01-01", "2024-01-02", "2024-01-03"]);
  });

  it("keeps the last bar seen for a duplicated date", () => {
    const series = createPriceSeries("AAA", [bar("2024-01-01", 1), bar("2024-01-01", 5)]);
    expect(series.bars).toHaveLength(1);
    expect(series.bars[0]?.close).toBe(5);
  });

  it("drops bars without a finite close or a real date", () => {
    const series = createPriceSeries("AAA", [
      bar("2024-01-01", Number.NaN),
      bar("2024-02-30", 2),
      bar("2024-01-02", Number.POSITIVE_INFINITY),
      bar("2024-01-03", 3)
    ]);
    expect(series.bars.map((b) => b.close)).toEqual([3]);
  });

  it("freezes the series and its bars", () => {
    const series = seriesFromCloses("AAA", [1, 2]);
    expect(Object.isFrozen(series)).toBe(true);
    expect(Object.isFrozen(series.bars)).toBe(true);
    expect(Object.isFrozen(series.bars[0])).toBe(true);
  });
});

describe("series accessors", () => {
  it("treats an empty series as a normal value", () => {
    const series = emptySeries("AAA");
    expect(isEmptySeries(series)).toBe(true);
    expect(latestClose(series)).toBeNull();
    expect(closeBack(series, 1)).toBeNull();
    expect(tailBars(series, 5)).toEqual([]);
  });

  it("reads closes counted back from the latest bar", () => {
    const series = seriesFromCloses("AAA", [10, 11, 12]);
    expect(latestClose(series)).toBe(12);
    expect(closeBack(series, 0)).toBe(12);
    expect(closeBack(series, 2)).toBe(10);
    expect(closeBack(series, 3)).toBeNull();
  });

  it("returns trailing bars", () => {
    const series = seriesFromCloses("AAA", [10, 11, 12]);
    expect(tailBars(series, 2).map((b) => b.close)).toEqual([11, 12]);
    expect(tailBars(series, 10).map((b) => b.close)).toEqual([10, 11, 12]);
    expect(tailBars(series, 0)).toEqual([]);
  });
});
