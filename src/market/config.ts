import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { DEFAULT_TIME_ZONE } from "../lib/date";

import { DEFAULT_INSIGHT_THRESHOLDS, INSIGHT_THRESHOLD_KEYS, type InsightThresholds } from "./insights";
import type { Instrument, InstrumentGroup, LeaderboardSpec, RankDirection, Timeframe, Universe } from "./types";
import { RANK_DIRECTIONS } from "./types";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 32;

export type ChartDefinition = {
  id: string;
  title: string;
  groups: string[];
  /** Trailing bars plotted per symbol. */
  bars: number;
};

export type IndexComparisonConfig = {
  groups: string[];
  offsetBars: number;
  rows: number;
};

export type ReportConfig = {
  timeframes: Timeframe[];
  leaderboards: LeaderboardSpec[];
  stats: { timeframe: string; groups: string[] };
  insights: { thresholds: InsightThresholds };
  fetch: { concurrency: number; lookbackDays: number };
  indexComparison: IndexComparisonConfig | null;
  charts: ChartDefinition[];
  report: { title: string; subject: string; timeZone: string };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertRecord(value: unknown, name: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${name} must be an object`);
  }
  return value;
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${name} must be a non-empty string`);
  }
  return value;
}

function assertNumber(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number`);
  }
  return value;
}

function assertPositiveInteger(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got ${n}`);
  }
  return n;
}

function assertArray(value: unknown, name: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${name} must be an array`);
  }
  return value;
}

function optionalStringList(value: unknown, name: string): string[] {
  if (value === undefined) {
    return [];
  }
  return assertArray(value, name).map((v, i) => assertString(v, `${name}[${i}]`));
}

function assertDirection(value: unknown, name: string): RankDirection {
  for (const direction of RANK_DIRECTIONS) {
    if (value === direction) {
      return direction;
    }
  }
  throw new Error(`${name} must be one of ${RANK_DIRECTIONS.join(", ")}, got ${String(value)}`);
}

function assertTimeZone(value: string, name: string): string {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
  } catch {
    throw new Error(`${name} is not a known time zone: ${value}`);
  }
  return value;
}

function validateInstrument(raw: unknown, group: string, name: string): Instrument {
  if (typeof raw === "string") {
    const symbol = assertString(raw, name);
    return { symbol, name: symbol, group };
  }

  const rec = assertRecord(raw, name);
  const symbol = assertString(rec.symbol, `${name}.symbol`);
  const label = rec.name === undefined ? symbol : assertString(rec.name, `${name}.name`);
  return { symbol, name: label, group };
}

export function parseUniverse(raw: unknown): Universe {
  const root = assertRecord(raw, "universe");
  const rawGroups = assertArray(root.groups, "universe.groups");

  const groupIds = new Set<string>();
  const symbols = new Set<string>();
  const groups: InstrumentGroup[] = rawGroups.map((rawGroup, gi) => {
    const g = assertRecord(rawGroup, `universe.groups[${gi}]`);
    const id = assertString(g.id, `universe.groups[${gi}].id`);
    if (groupIds.has(id)) {
      throw new Error(`Duplicate group id in universe: ${id}`);
    }
    groupIds.add(id);

    const label = g.label === undefined ? id : assertString(g.label, `universe.groups.${id}.label`);
    const instruments = assertArray(g.instruments, `universe.groups.${id}.instruments`).map((rawInstrument, ii) =>
      validateInstrument(rawInstrument, id, `universe.groups.${id}.instruments[${ii}]`)
    );

    for (const instrument of instruments) {
      if (symbols.has(instrument.symbol)) {
        throw new Error(`Symbol listed more than once in universe: ${instrument.symbol}`);
      }
      symbols.add(instrument.symbol);
    }

    return { id, label, instruments };
  });

  return { groups };
}

function validateTimeframe(raw: unknown, index: number): Timeframe {
  const rec = assertRecord(raw, `timeframes[${index}]`);
  const id = assertString(rec.id, `timeframes[${index}].id`);
  return {
    id,
    label: rec.label === undefined ? id : assertString(rec.label, `timeframes.${id}.label`),
    bars: assertPositiveInteger(rec.bars, `timeframes.${id}.bars`)
  };
}

function validateLeaderboard(raw: unknown, index: number, timeframeIds: ReadonlySet<string>): LeaderboardSpec {
  const rec = assertRecord(raw, `leaderboards[${index}]`);
  const role = assertString(rec.role, `leaderboards[${index}].role`);
  const timeframe = assertString(rec.timeframe, `leaderboards.${role}.timeframe`);
  if (!timeframeIds.has(timeframe)) {
    throw new Error(`leaderboards.${role}.timeframe references unknown timeframe: ${timeframe}`);
  }

  return {
    role,
    title: rec.title === undefined ? role : assertString(rec.title, `leaderboards.${role}.title`),
    groups: optionalStringList(rec.groups, `leaderboards.${role}.groups`),
    timeframe,
    direction: assertDirection(rec.direction, `leaderboards.${role}.direction`),
    limit: assertPositiveInteger(rec.limit, `leaderboards.${role}.limit`)
  };
}

function validateThresholds(raw: unknown): InsightThresholds {
  if (raw === undefined) {
    return { ...DEFAULT_INSIGHT_THRESHOLDS };
  }

  const rec = assertRecord(raw, "insights.thresholds");
  const known = new Set<string>(INSIGHT_THRESHOLD_KEYS);
  for (const key of Object.keys(rec)) {
    if (!known.has(key)) {
      throw new Error(`Unknown insight threshold: ${key}`);
    }
  }

  const out: InsightThresholds = { ...DEFAULT_INSIGHT_THRESHOLDS };
  for (const key of INSIGHT_THRESHOLD_KEYS) {
    if (rec[key] !== undefined) {
      out[key] = assertNumber(rec[key], `insights.thresholds.${key}`);
    }
  }
  return out;
}

function validateChart(raw: unknown, index: number): ChartDefinition {
  const rec = assertRecord(raw, `charts[${index}]`);
  const id = assertString(rec.id, `charts[${index}].id`);
  return {
    id,
    title: rec.title === undefined ? id : assertString(rec.title, `charts.${id}.title`),
    groups: optionalStringList(rec.groups, `charts.${id}.groups`),
    bars: assertPositiveInteger(rec.bars, `charts.${id}.bars`)
  };
}

function validateIndexComparison(raw: unknown): IndexComparisonConfig | null {
  if (raw === undefined || raw === null) {
    return null;
  }

  const rec = assertRecord(raw, "indexComparison");
  const groups = optionalStringList(rec.groups, "indexComparison.groups");
  if (groups.length === 0) {
    throw new Error("indexComparison.groups must list at least one group");
  }

  return {
    groups,
    offsetBars: assertPositiveInteger(rec.offsetBars, "indexComparison.offsetBars"),
    rows: assertPositiveInteger(rec.rows, "indexComparison.rows")
  };
}

/**
* Calendar days to request so the longest lookback still has enough trading bars:
* roughly 7 calendar days per 5 sessions, plus two weeks for holidays.
*/
export function lookbackDaysForBars(bars: number): number {
  return Math.ceil((bars * 7) / 5) + 14;
}

function requiredBars(cfg: Pick<ReportConfig, "timeframes" | "charts" | "indexComparison">): number {
  const needs = [
    ...cfg.timeframes.map((tf) => tf.bars + 1),
    ...cfg.charts.map((c) => c.bars),
    cfg.indexComparison ? cfg.indexComparison.offsetBars + cfg.indexComparison.rows : 0
  ];
  return Math.max(1, ...needs);
}

export function parseReportConfig(raw: unknown): ReportConfig {
  const cfg = assertRecord(raw, "report config");

  const timeframes = assertArray(cfg.timeframes, "timeframes").map(validateTimeframe);
  if (timeframes.length === 0) {
    throw new Error("report config must define at least one timeframe");
  }
  const timeframeIds = new Set<string>();
  for (const tf of timeframes) {
    if (timeframeIds.has(tf.id)) {
      throw new Error(`Duplicate timeframe id in report config: ${tf.id}`);
    }
    timeframeIds.add(tf.id);
  }

  const leaderboards = assertArray(cfg.leaderboards, "leaderboards").map((lb, i) =>
    validateLeaderboard(lb, i, timeframeIds)
  );
  const roles = new Set<string>();
  for (const lb of leaderboards) {
    if (roles.has(lb.role)) {
      throw new Error(`Duplicate leaderboard role in report config: ${lb.role}`);
    }
    roles.add(lb.role);
  }

  const rawStats = cfg.stats === undefined ? {} : assertRecord(cfg.stats, "stats");
  const statsTimeframe =
    rawStats.timeframe === undefined ? timeframes[0].id : assertString(rawStats.timeframe, "stats.timeframe");
  if (!timeframeIds.has(statsTimeframe)) {
    throw new Error(`stats.timeframe references unknown timeframe: ${statsTimeframe}`);
  }

  const rawInsights = cfg.insights === undefined ? {} : assertRecord(cfg.insights, "insights");
  const rawReport = cfg.report === undefined ? {} : assertRecord(cfg.report, "report");
  const title =
    rawReport.title === undefined ? "Market Performance Report" : assertString(rawReport.title, "report.title");

  const base = {
    timeframes,
    leaderboards,
    stats: { timeframe: statsTimeframe, groups: optionalStringList(rawStats.groups, "stats.groups") },
    insights: { thresholds: validateThresholds(rawInsights.thresholds) },
    indexComparison: validateIndexComparison(cfg.indexComparison),
    charts: cfg.charts === undefined ? [] : assertArray(cfg.charts, "charts").map(validateChart),
    report: {
      title,
      subject: rawReport.subject === undefined ? title : assertString(rawReport.subject, "report.subject"),
      timeZone: assertTimeZone(
        rawReport.timeZone === undefined ? DEFAULT_TIME_ZONE : assertString(rawReport.timeZone, "report.timeZone"),
        "report.timeZone"
      )
    }
  };

  const rawFetch = cfg.fetch === undefined ? {} : assertRecord(cfg.fetch, "fetch");
  const concurrency =
    rawFetch.concurrency === undefined
      ? DEFAULT_CONCURRENCY
      : assertPositiveInteger(rawFetch.concurrency, "fetch.concurrency");
  if (concurrency > MAX_CONCURRENCY) {
    throw new Error(`fetch.concurrency must be ≤ ${MAX_CONCURRENCY}, got ${concurrency}`);
  }
  const lookbackDays =
    rawFetch.lookbackDays === undefined
      ? lookbackDaysForBars(requiredBars(base))
      : assertPositiveInteger(rawFetch.lookbackDays, "fetch.lookbackDays");

  return { ...base, fetch: { concurrency, lookbackDays } };
}

/**
* Cross-checks group references in the report config against the universe.
*/
export function assertConfigMatchesUniverse(cfg: ReportConfig, universe: Universe): void {
  const known = new Set(universe.groups.map((g) => g.id));
  const check = (groups: readonly string[], where: string) => {
    for (const group of groups) {
      if (!known.has(group)) {
        throw new Error(`${where} references unknown group: ${group}`);
      }
    }
  };

  for (const lb of cfg.leaderboards) {
    check(lb.groups, `leaderboards.${lb.role}.groups`);
  }
  check(cfg.stats.groups, "stats.groups");
  for (const chart of cfg.charts) {
    check(chart.groups, `charts.${chart.id}.groups`);
  }
  if (cfg.indexComparison) {
    check(cfg.indexComparison.groups, "indexComparison.groups");
  }
}

export function universeInstruments(universe: Universe, groups: readonly string[] = []): Instrument[] {
  const wanted = groups.length > 0 ? new Set(groups) : null;
  return universe.groups.filter((g) => !wanted || wanted.has(g.id)).flatMap((g) => g.instruments);
}

export async function loadUniverse(rootDir = process.cwd()): Promise<Universe> {
  const filePath = path.join(rootDir, "config", "universe.json");
  const raw = await readFile(filePath, "utf8");
  try {
    return parseUniverse(JSON.parse(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[market:config] ${filePath}: ${message}`);
  }
}

export async function loadReportConfig(rootDir = process.cwd()): Promise<ReportConfig> {
  const filePath = path.join(rootDir, "config", "report.yml");
  const raw = await readFile(filePath, "utf8");
  try {
    return parseReportConfig(parseYaml(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[market:config] ${filePath}: ${message}`);
  }
}
