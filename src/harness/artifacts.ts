// ─── Run Artifacts ───────────────────────────────────────────────────
//
// Each harness run writes one CSV of raw samples and one JSON summary,
// both named with the run's timestamp. Readers pick the most recently
// modified pair.

import { mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { glob } from "glob";
import type { PipelineErrorKind } from "../errors.js";
import type {
  ConcurrentQueryResult,
  EvaluationAnalysis,
  LoadTestAnalysis,
  TimingSample,
} from "../types.js";
import { logger } from "../utils/logger.js";
import { parseCsv, toCsv } from "./csv.js";

const log = logger.child("artifacts");

export const LOAD_RESULTS_PATTERN = "load_test_results_*.csv";
export const LOAD_ANALYSIS_PATTERN = "load_test_analysis_*.json";
export const TIMING_RESULTS_PATTERN = "timing_results_*.csv";
export const TIMING_ANALYSIS_PATTERN = "analysis_*.json";

const LOAD_HEADER = ["Query", "Total Time", "Success", "Error", "Error Kind"];
const TIMING_HEADER = ["Total Time", "Translator Time", "Search Time", "Advisor Time"];

export interface ArtifactPaths {
  csvPath: string;
  jsonPath: string;
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatRunTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

// ─── Writers ─────────────────────────────────────────────────────────

export function saveLoadTestResults(
  outputDir: string,
  results: readonly ConcurrentQueryResult[],
  analysis: LoadTestAnalysis,
  now: Date = new Date(),
): ArtifactPaths {
  mkdirSync(outputDir, { recursive: true });
  const timestamp = formatRunTimestamp(now);
  const csvPath = resolve(outputDir, `load_test_results_${timestamp}.csv`);
  const jsonPath = resolve(outputDir, `load_test_analysis_${timestamp}.json`);

  const rows = results.map((r) => [r.query, r.totalTime, r.success, r.error, r.errorKind]);
  writeFileSync(csvPath, toCsv(LOAD_HEADER, rows));
  writeFileSync(jsonPath, JSON.stringify(loadAnalysisToJson(analysis), null, 4) + "\n");

  log.info("Saved load test results", { csvPath, jsonPath, rows: results.length });
  return { csvPath, jsonPath };
}

export function saveEvaluationResults(
  outputDir: string,
  samples: readonly TimingSample[],
  analysis: EvaluationAnalysis,
  now: Date = new Date(),
): ArtifactPaths {
  mkdirSync(outputDir, { recursive: true });
  const timestamp = formatRunTimestamp(now);
  const csvPath = resolve(outputDir, `timing_results_${timestamp}.csv`);
  const jsonPath = resolve(outputDir, `analysis_${timestamp}.json`);

  const rows = samples.map((s) => [s.total, s.translator, s.search, s.advisor]);
  writeFileSync(csvPath, toCsv(TIMING_HEADER, rows));
  writeFileSync(jsonPath, JSON.stringify(evaluationAnalysisToJson(analysis), null, 4) + "\n");

  log.info("Saved evaluation results", { csvPath, jsonPath, rows: samples.length });
  return { csvPath, jsonPath };
}

// ─── Summary JSON layout ─────────────────────────────────────────────

export function loadAnalysisToJson(analysis: LoadTestAnalysis): Record<string, unknown> {
  const t = analysis.responseTimes;
  return {
    total_queries: analysis.totalQueries,
    successful_queries: analysis.successfulQueries,
    failed_queries: analysis.failedQueries,
    success_rate: analysis.successRate,
    response_times: {
      mean: t.mean,
      median: t.median,
      std_dev: t.stdDev,
      min: t.min,
      max: t.max,
      "95th_percentile": t.p95,
    },
  };
}

export function evaluationAnalysisToJson(analysis: EvaluationAnalysis): Record<string, unknown> {
  const t = analysis.total;
  return {
    total: { mean: t.mean, median: t.median, std_dev: t.stdDev, min: t.min, max: t.max },
    components: { ...analysis.components },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sectionOf(obj: Record<string, unknown>, key: string, file: string): Record<string, unknown> {
  const value = obj[key];
  if (!isRecord(value)) throw new Error(`${file}: "${key}" must be an object`);
  return value;
}

function numberOf(obj: Record<string, unknown>, key: string, file: string): number {
  const value = obj[key];
  if (typeof value !== "number") throw new Error(`${file}: "${key}" must be a number`);
  return value;
}

export function parseLoadAnalysisJson(data: unknown, file = "analysis"): LoadTestAnalysis {
  if (!isRecord(data)) throw new Error(`${file}: expected a JSON object`);
  const t = sectionOf(data, "response_times", file);
  return {
    totalQueries: numberOf(data, "total_queries", file),
    successfulQueries: numberOf(data, "successful_queries", file),
    failedQueries: numberOf(data, "failed_queries", file),
    successRate: numberOf(data, "success_rate", file),
    responseTimes: {
      mean: numberOf(t, "mean", file),
      median: numberOf(t, "median", file),
      stdDev: numberOf(t, "std_dev", file),
      min: numberOf(t, "min", file),
      max: numberOf(t, "max", file),
      p95: numberOf(t, "95th_percentile", file),
    },
  };
}

export function parseEvaluationAnalysisJson(data: unknown, file = "analysis"): EvaluationAnalysis {
  if (!isRecord(data)) throw new Error(`${file}: expected a JSON object`);
  const t = sectionOf(data, "total", file);
  const c = sectionOf(data, "components", file);
  return {
    total: {
      mean: numberOf(t, "mean", file),
      median: numberOf(t, "median", file),
      stdDev: numberOf(t, "std_dev", file),
      min: numberOf(t, "min", file),
      max: numberOf(t, "max", file),
    },
    components: {
      translator: numberOf(c, "translator", file),
      search: numberOf(c, "search", file),
      advisor: numberOf(c, "advisor", file),
    },
  };
}

// ─── Readers ─────────────────────────────────────────────────────────

function dataRows(csvPath: string, header: readonly string[]): string[][] {
  const [first, ...rows] = parseCsv(readFileSync(csvPath, "utf-8"));
  if (!first || first.join(",") !== header.join(",")) {
    throw new Error(`${csvPath}: unexpected header`);
  }
  return rows.filter((row) => row.length > 1 || row[0] !== "");
}

function toNumber(value: string | undefined, csvPath: string): number {
  const n = Number(value);
  if (value === undefined || value === "" || Number.isNaN(n)) {
    throw new Error(`${csvPath}: "${value}" is not a number`);
  }
  return n;
}

export function readLoadResultsCsv(csvPath: string): ConcurrentQueryResult[] {
  return dataRows(csvPath, LOAD_HEADER).map(([query = "", total, success, error, kind]) => {
    const errorKind = kind ? toErrorKind(kind) : undefined;
    return {
      query,
      totalTime: toNumber(total, csvPath),
      success: success?.toLowerCase() === "true",
      ...(error ? { error } : {}),
      ...(errorKind ? { errorKind } : {}),
    };
  });
}

function toErrorKind(kind: string): PipelineErrorKind | undefined {
  switch (kind) {
    case "invalid-input":
    case "upstream-transport":
    case "upstream-format":
    case "internal":
      return kind;
    default:
      return undefined;
  }
}

export function readTimingSamplesCsv(csvPath: string): TimingSample[] {
  return dataRows(csvPath, TIMING_HEADER).map(([total, translator, search, advisor]) => ({
    total: toNumber(total, csvPath),
    translator: toNumber(translator, csvPath),
    search: toNumber(search, csvPath),
    advisor: toNumber(advisor, csvPath),
  }));
}

/** Most recently modified file in `dir` matching `pattern` */
export async function findLatestArtifact(dir: string, pattern: string): Promise<string | undefined> {
  const files = await glob(pattern, { cwd: dir, absolute: true, nodir: true });
  let latest: { path: string; mtimeMs: number } | undefined;
  for (const file of files) {
    const { mtimeMs } = statSync(file);
    if (!latest || mtimeMs > latest.mtimeMs) {
      latest = { path: file, mtimeMs };
    }
  }
  return latest?.path;
}

export interface LatestLoadRun {
  results: ConcurrentQueryResult[];
  analysis: LoadTestAnalysis;
  files: ArtifactPaths;
}

export interface LatestEvaluationRun {
  samples: TimingSample[];
  analysis: EvaluationAnalysis;
  files: ArtifactPaths;
}

export async function loadLatestLoadRun(dir: string): Promise<LatestLoadRun | undefined> {
  const csvPath = await findLatestArtifact(dir, LOAD_RESULTS_PATTERN);
  const jsonPath = await findLatestArtifact(dir, LOAD_ANALYSIS_PATTERN);
  if (!csvPath || !jsonPath) return undefined;
  return {
    results: readLoadResultsCsv(csvPath),
    analysis: parseLoadAnalysisJson(JSON.parse(readFileSync(jsonPath, "utf-8")), jsonPath),
    files: { csvPath, jsonPath },
  };
}

export async function loadLatestEvaluationRun(dir: string): Promise<LatestEvaluationRun | undefined> {
  const csvPath = await findLatestArtifact(dir, TIMING_RESULTS_PATTERN);
  const jsonPath = await findLatestArtifact(dir, TIMING_ANALYSIS_PATTERN);
  if (!csvPath || !jsonPath) return undefined;
  return {
    samples: readTimingSamplesCsv(csvPath),
    analysis: parseEvaluationAnalysisJson(JSON.parse(readFileSync(jsonPath, "utf-8")), jsonPath),
    files: { csvPath, jsonPath },
  };
}
