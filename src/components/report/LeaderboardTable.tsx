import { formatMaybeSignedPct, formatPrice } from "../../market/format";
import type { Leaderboard, PerformanceRecord, Timeframe } from "../../market/types";

import { changeStyle, styles } from "./styles";

function instrumentLabel(record: PerformanceRecord): string {
  return record.name === record.symbol ? record.symbol : `${record.name} (${record.symbol})`;
}

type LeaderboardTableProps = {
  leaderboard: Leaderboard;
  /** Every configured timeframe is shown; the ranking timeframe is marked in the header. */
  timeframes: readonly Timeframe[];
};

export function LeaderboardTable(props: LeaderboardTableProps) {
  const { leaderboard, timeframes } = props;

  return (
    <section>
      <h3 style={styles.heading}>{leaderboard.title}</h3>
      {leaderboard.entries.length === 0 ? (
        <p style={styles.muted}>No data available</p>
      ) : (
        <table style={styles.table}>
          <thead>
            <tr>
              <th style={styles.th}>#</th>
              <th style={styles.th}>Instrument</th>
              <th style={styles.th}>Price</th>
              {timeframes.map((tf) => (
                <th key={tf.id} style={styles.th}>
                  {tf.id === leaderboard.timeframe.id ? `${tf.label} ▸` : tf.label}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {leaderboard.entries.map((record, i) => (
              <tr key={record.symbol}>
                <td style={styles.td}>{i + 1}</td>
                <td style={styles.td}>{instrumentLabel(record)}</td>
                <td style={styles.tdNumber}>{formatPrice(record.currentPrice)}</td>
                {timeframes.map((tf) => {
                  const change = record.changes[tf.id] ?? null;
                  return (
                    <td key={tf.id} style={changeStyle(change)}>
                      {formatMaybeSignedPct(change)}
                    </td>
                  );
                })}
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
}
