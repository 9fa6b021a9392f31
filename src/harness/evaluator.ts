// ─── Sequential Evaluation Harness ───────────────────────────────────

import { DEFAULT_RESULT_LIMIT } from "../pipeline/search-executor.js";
import type { EvaluationAnalysis, TimingSample } from "../types.js";
import { logger } from "../utils/logger.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { max, mean, median, min, sampleStdDev } from "../utils/stats.js";
import type { PipelineRunner } from "./load-tester.js";

const log = logger.child("evaluation");

export interface EvaluatorOptions {
  /** Spacing between invocations; defaults to none */
  limiter?: RateLimiter;
  /** Result limit passed to every invocation */
  limit?: number;
}

/**
 * Runs every query `iterations` times, one invocation at a time, and
 * records the per-stage breakdown of each. Failed invocations are logged
 * and left out of the samples.
 */
export class Evaluator {
  private readonly pipeline: PipelineRunner;
  private readonly limiter: RateLimiter;
  private readonly limit: number;

  constructor(pipeline: PipelineRunner, options: EvaluatorOptions = {}) {
    this.pipeline = pipeline;
    this.limiter = options.limiter ?? new RateLimiter({ minIntervalMs: 0 });
    this.limit = options.limit ?? DEFAULT_RESULT_LIMIT;
  }

  async measureQuery(query: string): Promise<TimingSample | undefined> {
    await this.limiter.acquire();
    const result = await this.pipeline.tryExecute(query, this.limit);
    if (!result.ok) {
      log.error("Error processing query", {
        query,
        kind: result.error.kind,
        error: result.error.message,
      });
      return undefined;
    }
    return result.run.timings;
  }

  async runEvaluation(queries: readonly string[], iterations = 10): Promise<TimingSample[]> {
    const samples: TimingSample[] = [];
    for (const query of queries) {
      for (let i = 0; i < iterations; i++) {
        const sample = await this.measureQuery(query);
        if (sample) samples.push(sample);
      }
    }
    log.info("Evaluation complete", {
      planned: queries.length * Math.max(0, iterations),
      recorded: samples.length,
    });
    return samples;
  }
}

export function analyzeTimings(samples: readonly TimingSample[]): EvaluationAnalysis {
  const totals = samples.map((s) => s.total);
  return {
    total: {
      mean: mean(totals),
      median: median(totals),
      stdDev: sampleStdDev(totals),
      min: min(totals),
      max: max(totals),
    },
    components: {
      translator: mean(samples.map((s) => s.translator)),
      search: mean(samples.map((s) => s.search)),
      advisor: mean(samples.map((s) => s.advisor)),
    },
  };
}
