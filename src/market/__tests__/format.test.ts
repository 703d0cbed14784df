import { describe, expect, it } from "vitest";

import { formatMaybeSignedPct, formatPct, formatPrice, formatSignedPct } from "../format";

describe("formatSignedPct", () => {
  it("signs gains and losses with two decimals", () => {
    expect(formatSignedPct(4.2)).toBe("+4.20%");
    expect(formatSignedPct(-1.5)).toBe("-1.50%");
    expect(formatSignedPct(2.675)).toBe("+2.68%");
  });

  it("never signs a value that rounds to zero", () => {
    expect(formatSignedPct(0)).toBe("0.00%");
    expect(formatSignedPct(-0.001)).toBe("0.00%");
    expect(formatSignedPct(0.004)).toBe("0.00%");
  });

  it("prints a dash for unavailable values", () => {
    expect(formatMaybeSignedPct(null)).toBe("—");
    expect(formatMaybeSignedPct(1)).toBe("+1.00%");
  });
});

describe("formatPrice", () => {
  it("groups thousands and keeps two decimals", () => {
    expect(formatPrice(2456.5)).toBe("2,456.50");
    expect(formatPrice(null)).toBe("—");
    expect(formatPrice(Number.NaN)).toBe("—");
  });
});

describe("formatPct", () => {
  it("prints unsigned percentages", () => {
    expect(formatPct(65)).toBe("65.00%");
    expect(formatPct(33.333)).toBe("33.33%");
  });
});
