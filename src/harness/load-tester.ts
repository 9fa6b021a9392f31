// ─── Concurrent Load Harness ─────────────────────────────────────────

import { describeError } from "../errors.js";
import { DEFAULT_RESULT_LIMIT } from "../pipeline/search-executor.js";
import type { PipelineOrchestrator } from "../pipeline/orchestrator.js";
import type { ConcurrentQueryResult, LoadTestAnalysis } from "../types.js";
import { logger } from "../utils/logger.js";
import { max, mean, median, min, percentile, sampleStdDev } from "../utils/stats.js";
import { Stopwatch, systemClock } from "../utils/timing.js";
import type { Clock } from "../utils/timing.js";

const log = logger.child("load-test");

/** The slice of the orchestrator the harnesses drive */
export type PipelineRunner = Pick<PipelineOrchestrator, "tryExecute">;

export interface LoadTesterOptions {
  /** Result limit passed to every invocation */
  limit?: number;
  clock?: Clock;
}

/**
 * Pick exactly `count` queries, cycling through the list in order.
 * An empty list or non-positive count yields no invocations.
 */
export function planInvocations(queries: readonly string[], count: number): string[] {
  if (queries.length === 0 || count <= 0) return [];
  return Array.from({ length: count }, (_, i) => queries[i % queries.length]);
}

/**
 * Simulates concurrent users by launching many pipeline invocations at
 * once and timing each one.
 */
export class LoadTester {
  private readonly pipeline: PipelineRunner;
  private readonly limit: number;
  private readonly clock: Clock;

  constructor(pipeline: PipelineRunner, options: LoadTesterOptions = {}) {
    this.pipeline = pipeline;
    this.limit = options.limit ?? DEFAULT_RESULT_LIMIT;
    this.clock = options.clock ?? systemClock;
  }

  async executeSingleQuery(query: string): Promise<ConcurrentQueryResult> {
    const stopwatch = new Stopwatch(this.clock);
    const result = await this.pipeline.tryExecute(query, this.limit);
    const totalTime = stopwatch.elapsed();

    if (result.ok) {
      return { query, totalTime, success: true };
    }
    return {
      query,
      totalTime,
      success: false,
      error: result.error.message,
      errorKind: result.error.kind,
    };
  }

  /**
   * Launch `concurrentUsers` invocations together and wait for all of
   * them. One failure never cancels its siblings.
   */
  async runConcurrentQueries(
    queries: readonly string[],
    concurrentUsers: number,
  ): Promise<ConcurrentQueryResult[]> {
    const planned = planInvocations(queries, concurrentUsers);
    log.info("Launching concurrent invocations", {
      requested: concurrentUsers,
      launched: planned.length,
    });

    const settled = await Promise.allSettled(planned.map((q) => this.executeSingleQuery(q)));

    const results: ConcurrentQueryResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        results.push(outcome.value);
      } else {
        log.error("Invocation crashed outside the pipeline", {
          error: describeError(outcome.reason),
        });
      }
    }
    return results;
  }
}

/**
 * Success rate over every result; response-time statistics over
 * successful results only.
 */
export function analyzeLoadResults(results: readonly ConcurrentQueryResult[]): LoadTestAnalysis {
  const successfulTimes = results.filter((r) => r.success).map((r) => r.totalTime);
  const failed = results.length - successfulTimes.length;

  return {
    totalQueries: results.length,
    successfulQueries: successfulTimes.length,
    failedQueries: failed,
    successRate: results.length > 0 ? (successfulTimes.length / results.length) * 100 : 0,
    responseTimes: {
      mean: mean(successfulTimes),
      median: median(successfulTimes),
      stdDev: sampleStdDev(successfulTimes),
      min: min(successfulTimes),
      max: max(successfulTimes),
      p95: percentile(successfulTimes, 95),
    },
  };
}
