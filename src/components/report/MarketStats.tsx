import { formatPct } from "../../market/format";
import type { AggregateStats, Timeframe } from "../../market/types";

import { styles } from "./styles";

export function MarketStats(props: { stats: AggregateStats; timeframes: readonly Timeframe[] }) {
  const { stats } = props;
  const label = props.timeframes.find((tf) => tf.id === stats.timeframe)?.label ?? stats.timeframe;
  const breadth = stats.breadthPct === null ? "n/a" : formatPct(stats.breadthPct);

  return (
    <section>
      <h3 style={styles.heading}>{`Market breadth (${label})`}</h3>
      <table style={styles.table}>
        <tbody>
          <tr>
            <th style={styles.th}>Tracked</th>
            <td style={styles.tdNumber}>{stats.tracked}</td>
          </tr>
          <tr>
            <th style={styles.th}>Gainers</th>
            <td style={styles.tdNumber}>{stats.gainers}</td>
          </tr>
          <tr>
            <th style={styles.th}>Losers</th>
            <td style={styles.tdNumber}>{stats.losers}</td>
          </tr>
          <tr>
            <th style={styles.th}>Breadth</th>
            <td style={styles.tdNumber}>{breadth}</td>
          </tr>
        </tbody>
      </table>
    </section>
  );
}
