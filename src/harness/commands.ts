// ─── Harness CLI Commands ────────────────────────────────────────────

import { readFileSync } from "node:fs";
import type { VulnGuideConfig } from "../types.js";
import { getArgValue, getIntArg } from "../utils/args.js";
import { logger } from "../utils/logger.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import {
  loadAnalysisToJson,
  evaluationAnalysisToJson,
  loadLatestEvaluationRun,
  loadLatestLoadRun,
  saveEvaluationResults,
  saveLoadTestResults,
} from "./artifacts.js";
import { formatEvaluationAnalysis, formatLoadAnalysis } from "./console-report.js";
import { Evaluator, analyzeTimings } from "./evaluator.js";
import { LoadTester, analyzeLoadResults } from "./load-tester.js";
import type { PipelineRunner } from "./load-tester.js";

export interface CommandContext {
  config: VulnGuideConfig;
  /** Built lazily so `summary` never needs upstream credentials */
  pipeline: () => PipelineRunner;
  /** Console sink for human-readable or JSON output */
  print: (line: string) => void;
  now?: () => Date;
}

/**
 * Queries from a JSON array file, or one per line from any other file.
 */
export function readQueriesFile(path: string): string[] {
  const text = readFileSync(path, "utf-8");
  if (path.endsWith(".json")) {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed) || !parsed.every((q): q is string => typeof q === "string")) {
      throw new Error(`${path} must contain a JSON array of strings`);
    }
    return parsed;
  }
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function queriesFrom(argv: readonly string[], config: VulnGuideConfig): string[] {
  const file = getArgValue(argv, "--queries");
  return file ? readQueriesFile(file) : config.harness.queries;
}

export async function runLoadCommand(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const users = getIntArg(argv, "--users", ctx.config.harness.concurrentUsers);
  const outputDir = getArgValue(argv, "--output") ?? ctx.config.harness.loadOutputDir;
  const queries = queriesFrom(argv, ctx.config);

  logger.info("Starting load test", { concurrentUsers: users, queries: queries.length });
  const tester = new LoadTester(ctx.pipeline(), { limit: ctx.config.server.defaultLimit });
  const results = await tester.runConcurrentQueries(queries, users);
  const analysis = analyzeLoadResults(results);
  saveLoadTestResults(outputDir, results, analysis, ctx.now?.());

  if (argv.includes("--json")) {
    ctx.print(JSON.stringify(loadAnalysisToJson(analysis), null, 2));
  } else {
    formatLoadAnalysis(analysis).forEach(ctx.print);
  }
  return analysis.failedQueries > 0 ? 1 : 0;
}

export async function runEvaluateCommand(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const iterations = getIntArg(argv, "--iterations", ctx.config.harness.iterations);
  const cooldownMs = getIntArg(argv, "--cooldown", ctx.config.harness.cooldownMs);
  const outputDir = getArgValue(argv, "--output") ?? ctx.config.harness.evaluationOutputDir;
  const queries = queriesFrom(argv, ctx.config);

  logger.info("Starting performance evaluation", {
    queries: queries.length,
    iterations,
    cooldownMs,
  });
  const evaluator = new Evaluator(ctx.pipeline(), {
    limiter: new RateLimiter({ minIntervalMs: cooldownMs }),
    limit: ctx.config.server.defaultLimit,
  });
  const samples = await evaluator.runEvaluation(queries, iterations);
  const analysis = analyzeTimings(samples);
  saveEvaluationResults(outputDir, samples, analysis, ctx.now?.());

  if (argv.includes("--json")) {
    ctx.print(JSON.stringify(evaluationAnalysisToJson(analysis), null, 2));
  } else {
    formatEvaluationAnalysis(analysis).forEach(ctx.print);
  }
  return samples.length > 0 ? 0 : 1;
}

/** Print the most recent saved run of either harness */
export async function runSummaryCommand(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const kind = getArgValue(argv, "--kind") ?? "load";
  const json = argv.includes("--json");

  if (kind === "load") {
    const dir = getArgValue(argv, "--output") ?? ctx.config.harness.loadOutputDir;
    const run = await loadLatestLoadRun(dir);
    if (!run) {
      logger.warn("No load test results found", { dir });
      return 1;
    }
    logger.info("Loaded load test results", { ...run.files, rows: run.results.length });
    if (json) ctx.print(JSON.stringify(loadAnalysisToJson(run.analysis), null, 2));
    else formatLoadAnalysis(run.analysis).forEach(ctx.print);
    return 0;
  }

  if (kind === "evaluate") {
    const dir = getArgValue(argv, "--output") ?? ctx.config.harness.evaluationOutputDir;
    const run = await loadLatestEvaluationRun(dir);
    if (!run) {
      logger.warn("No evaluation results found", { dir });
      return 1;
    }
    logger.info("Loaded evaluation results", { ...run.files, rows: run.samples.length });
    if (json) ctx.print(JSON.stringify(evaluationAnalysisToJson(run.analysis), null, 2));
    else formatEvaluationAnalysis(run.analysis).forEach(ctx.print);
    return 0;
  }

  throw new Error(`Unknown --kind "${kind}" (expected "load" or "evaluate")`);
}

export type Command = (argv: readonly string[], ctx: CommandContext) => Promise<number>;

export const COMMANDS: ReadonlyMap<string, Command> = new Map([
  ["load", runLoadCommand],
  ["evaluate", runEvaluateCommand],
  ["summary", runSummaryCommand],
]);
