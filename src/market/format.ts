import { PCT_DECIMALS, roundHalfUp } from "./changes";

/**
* `+4.20%`, `-1.50%`, `0.00%`. Values that round to zero never carry a sign.
*/
export function formatSignedPct(value: number): string {
  const rounded = roundHalfUp(value, PCT_DECIMALS);
  if (rounded === 0) {
    return `${(0).toFixed(PCT_DECIMALS)}%`;
  }

  const sign = rounded > 0 ? "+" : "-";
  return `${sign}${Math.abs(rounded).toFixed(PCT_DECIMALS)}%`;
}

export function formatMaybeSignedPct(value: number | null): string {
  return value === null ? "—" : formatSignedPct(value);
}

export function formatPrice(value: number | null): string {
  if (value === null || !Number.isFinite(value)) {
    return "—";
  }

  return value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatPct(value: number): string {
  return `${roundHalfUp(value, PCT_DECIMALS).toFixed(PCT_DECIMALS)}%`;
}
