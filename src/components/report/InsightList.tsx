import type { Insight, InsightSeverity } from "../../market/types";

import { styles } from "./styles";

const SEVERITY_MARK: Record<InsightSeverity, string> = {
  info: "ℹ️",
  positive: "📈",
  warning: "⚠️"
};

export function InsightList(props: { insights: readonly Insight[] }) {
  return (
    <section>
      <h3 style={styles.heading}>Market insights</h3>
      <ul style={styles.insightList}>
        {props.insights.map((insight) => (
          <li key={insight.ruleId} style={styles.insight} data-severity={insight.severity}>
            {`${SEVERITY_MARK[insight.severity]} ${insight.text}`}
          </li>
        ))}
      </ul>
    </section>
  );
}
