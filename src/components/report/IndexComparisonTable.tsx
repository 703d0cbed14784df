import { formatMaybeSignedPct } from "../../market/format";
import type { IndexComparison } from "../../market/types";

import { changeStyle, styles } from "./styles";

export function IndexComparisonTable(props: { comparison: IndexComparison }) {
  const { comparison } = props;

  return (
    <section>
      <h4 style={styles.subheading}>{comparison.name}</h4>
      {comparison.rows.length === 0 ? (
        <p style={styles.muted}>No data available</p>
      ) : (
        <table style={styles.table}>
          <thead>
            <tr>
              <th style={styles.th}>Day</th>
              <th style={styles.th}>Date</th>
              <th style={styles.th}>{`% change vs ${comparison.offsetBars} sessions earlier`}</th>
            </tr>
          </thead>
          <tbody>
            {comparison.rows.map((row) => (
              <tr key={row.date}>
                <td style={styles.td}>{row.weekday}</td>
                <td style={styles.td}>{row.date}</td>
                <td style={changeStyle(row.pctChange)}>{formatMaybeSignedPct(row.pctChange)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
}
