import { renderToStaticMarkup } from "react-dom/server";

import { ReportEmail } from "../components/report/ReportEmail";

import type { ChartData } from "./charts";
import type { EngineOutput, ReportDocument } from "./types";

export function buildReportSubject(subject: string, date: string): string {
  return `📊 ${subject}: ${date}`;
}

/**
* Renders the engine output into a standalone HTML document plus subject line. Rendering never
* fails on missing data: empty leaderboards and charts fall back to "No data available".
*/
export function buildReportDocument(args: {
  title: string;
  subject: string;
  date: string;
  output: EngineOutput;
  charts: readonly ChartData[];
  generatedAt?: string;
}): ReportDocument {
  const markup = renderToStaticMarkup(
    <ReportEmail
      title={args.title}
      date={args.date}
      generatedAt={args.generatedAt ?? new Date().toISOString()}
      output={args.output}
      charts={args.charts}
    />
  );

  return {
    subject: buildReportSubject(args.subject, args.date),
    html: `<!DOCTYPE html>${markup}`
  };
}
