import type { CSSProperties } from "react";

// Email clients drop <style> blocks unevenly, so everything is inlined.
export const styles = {
  body: {
    fontFamily: "Arial, Helvetica, sans-serif",
    color: "#111827",
    backgroundColor: "#ffffff",
    margin: 0,
    padding: "16px"
  },
  title: { fontSize: "22px", margin: "0 0 4px" },
  heading: { fontSize: "16px", margin: "20px 0 8px" },
  subheading: { fontSize: "14px", margin: "12px 0 6px" },
  muted: { color: "#6b7280", fontSize: "12px", margin: "4px 0" },
  table: { borderCollapse: "collapse", fontSize: "13px", minWidth: "360px" },
  th: { border: "1px solid #d1d5db", padding: "5px 8px", backgroundColor: "#f3f4f6", textAlign: "left" },
  td: { border: "1px solid #d1d5db", padding: "5px 8px" },
  tdNumber: { border: "1px solid #d1d5db", padding: "5px 8px", textAlign: "right" },
  positive: { color: "#047857" },
  negative: { color: "#b91c1c" },
  insightList: { paddingLeft: "18px", margin: "4px 0" },
  insight: { margin: "4px 0", fontSize: "13px" },
  legend: { listStyle: "none", padding: 0, margin: "4px 0", fontSize: "12px" },
  legendItem: { display: "inline-block", marginRight: "12px" }
} satisfies Record<string, CSSProperties>;

export function changeStyle(value: number | null): CSSProperties {
  if (value === null || value === 0) {
    return styles.tdNumber;
  }
  return { ...styles.tdNumber, ...(value > 0 ? styles.positive : styles.negative) };
}
