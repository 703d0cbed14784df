import type { ChartData } from "../../market/charts";
import type { EngineOutput } from "../../market/types";

import { IndexComparisonTable } from "./IndexComparisonTable";
import { InsightList } from "./InsightList";
import { LeaderboardTable } from "./LeaderboardTable";
import { MarketStats } from "./MarketStats";
import { PriceChart } from "./PriceChart";
import { styles } from "./styles";

export type ReportEmailProps = {
  title: string;
  date: string;
  generatedAt: string;
  output: EngineOutput;
  charts: readonly ChartData[];
};

export function ReportEmail(props: ReportEmailProps) {
  const { output } = props;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{`${props.title}: ${props.date}`}</title>
      </head>
      <body style={styles.body}>
        <h2 style={styles.title}>{`📊 ${props.title}`}</h2>
        <p style={styles.muted}>{`Report date ${props.date} · generated ${props.generatedAt}`}</p>

        <MarketStats stats={output.stats} timeframes={output.timeframes} />

        {output.leaderboards.map((lb) => (
          <LeaderboardTable key={lb.role} leaderboard={lb} timeframes={output.timeframes} />
        ))}

        {props.charts.map((chart) => (
          <PriceChart key={chart.id} chart={chart} />
        ))}

        {output.indexComparisons.length > 0 ? (
          <section>
            <h3 style={styles.heading}>Index week-over-week daily comparison</h3>
            {output.indexComparisons.map((comparison) => (
              <IndexComparisonTable key={comparison.symbol} comparison={comparison} />
            ))}
          </section>
        ) : null}

        <InsightList insights={output.insights} />

        {output.missingSymbols.length > 0 ? (
          <p style={styles.muted}>
            {`No data from provider (${output.missingSymbols.length}): ${output.missingSymbols.join(", ")}`}
          </p>
        ) : null}
      </body>
    </html>
  );
}
