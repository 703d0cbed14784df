import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { buildChartData } from "./charts";
import { collectSeries } from "./collect";
import {
  assertConfigMatchesUniverse,
  loadReportConfig,
  loadUniverse,
  universeInstruments,
  type ReportConfig
} from "./config";
import { ResendEmailDelivery, loadEmailSettings } from "./delivery/email";
import { runPerformanceEngine } from "./engine";
import { YahooPriceDataProvider } from "./providers/yahoo";
import { buildReportDocument } from "./report";
import type { EngineOutput, PriceDataProvider, ReportDelivery, ReportDocument, Universe } from "./types";

export type MarketReportOptions = {
  date: string;
  concurrency?: number;
  /** Writes the rendered HTML here as well. */
  outPath?: string;
  /** Render only; skip delivery. */
  dryRun?: boolean;
  rootDir?: string;
};

export type MarketReportDeps = {
  universe?: Universe;
  config?: ReportConfig;
  provider?: PriceDataProvider;
  delivery?: ReportDelivery;
};

export type MarketReportResult = {
  date: string;
  tracked: number;
  evaluated: number;
  missingSymbols: string[];
  failedSymbols: string[];
  leaderboards: Record<string, number>;
  insights: number;
  delivered: boolean;
  wroteFile: string | null;
};

export async function generateMarketReport(
  opts: MarketReportOptions,
  deps: MarketReportDeps = {}
): Promise<{ output: EngineOutput; document: ReportDocument; failedSymbols: string[] }> {
  const rootDir = opts.rootDir ?? process.cwd();
  const universe = deps.universe ?? (await loadUniverse(rootDir));
  const config = deps.config ?? (await loadReportConfig(rootDir));
  assertConfigMatchesUniverse(config, universe);

  const provider = deps.provider ?? new YahooPriceDataProvider({ timeZone: config.report.timeZone });
  const collected = await collectSeries(provider, universeInstruments(universe), {
    range: { end: opts.date, lookbackDays: config.fetch.lookbackDays },
    concurrency: opts.concurrency ?? config.fetch.concurrency
  });

  if (collected.missingSymbols.length > 0) {
    console.error(
      `[market:data] no data for ${collected.missingSymbols.length} symbol(s): ${collected.missingSymbols.join(", ")}`
    );
  }

  const output = runPerformanceEngine({ universe, seriesBySymbol: collected.seriesBySymbol, config });
  const charts = config.charts.map((def) => buildChartData(def, universe, collected.seriesBySymbol));
  const document = buildReportDocument({
    title: config.report.title,
    subject: config.report.subject,
    date: opts.date,
    output,
    charts
  });

  return { output, document, failedSymbols: collected.failedSymbols };
}

export async function runMarketReport(
  opts: MarketReportOptions,
  deps: MarketReportDeps = {}
): Promise<MarketReportResult> {
  const { output, document, failedSymbols } = await generateMarketReport(opts, deps);

  let wroteFile: string | null = null;
  if (opts.outPath) {
    wroteFile = path.resolve(opts.rootDir ?? process.cwd(), opts.outPath);
    await mkdir(path.dirname(wroteFile), { recursive: true });
    await writeFile(wroteFile, document.html, "utf8");
  }

  let delivered = false;
  if (!opts.dryRun) {
    const delivery = deps.delivery ?? new ResendEmailDelivery(loadEmailSettings());
    await delivery.send(document);
    delivered = true;
  }

  return {
    date: opts.date,
    tracked: output.stats.tracked,
    evaluated: output.stats.evaluated,
    missingSymbols: output.missingSymbols,
    failedSymbols,
    leaderboards: Object.fromEntries(output.leaderboards.map((lb) => [lb.role, lb.entries.length])),
    insights: output.insights.length,
    delivered,
    wroteFile
  };
}
