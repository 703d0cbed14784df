import { CartesianGrid, Line, LineChart, XAxis, YAxis } from "recharts";

import type { ChartData, ChartRow } from "../../market/charts";

import { styles } from "./styles";

// Fixed size: rendered once to static markup, so there is no container to measure.
const CHART_WIDTH = 700;
const CHART_HEIGHT = 320;

export function PriceChart(props: { chart: ChartData }) {
  const { chart } = props;

  if (chart.lines.length === 0 || chart.rows.length < 2) {
    return (
      <section>
        <h3 style={styles.heading}>{chart.title}</h3>
        <p style={styles.muted}>No data available</p>
      </section>
    );
  }

  return (
    <section>
      <h3 style={styles.heading}>{chart.title}</h3>
      <LineChart width={CHART_WIDTH} height={CHART_HEIGHT} data={chart.rows}>
        <CartesianGrid stroke="#e5e7eb" />
        <XAxis dataKey="date" fontSize={11} />
        <YAxis fontSize={11} domain={["auto", "auto"]} />
        {chart.lines.map((line) => (
          <Line
            key={line.symbol}
            type="monotone"
            dataKey={(row: ChartRow) => row.values[line.symbol]}
            name={line.name}
            stroke={line.color}
            dot={false}
            connectNulls
            isAnimationActive={false}
          />
        ))}
      </LineChart>
      <ul style={styles.legend}>
        {chart.lines.map((line) => (
          <li key={line.symbol} style={{ ...styles.legendItem, color: line.color }}>
            {line.name}
          </li>
        ))}
      </ul>
      <p style={styles.muted}>Close rebased to 100 at the first plotted session.</p>
    </section>
  );
}
