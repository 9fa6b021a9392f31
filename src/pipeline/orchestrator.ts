// ─── Pipeline Orchestrator ───────────────────────────────────────────

import { InvalidInputError, toPipelineError } from "../errors.js";
import type { PipelineResult, PipelineRun } from "../types.js";
import { logger } from "../utils/logger.js";
import { Stopwatch, systemClock } from "../utils/timing.js";
import type { Clock } from "../utils/timing.js";
import type { RemediationAdvisor } from "./advisor.js";
import { formatReport } from "./report.js";
import { DEFAULT_RESULT_LIMIT } from "./search-executor.js";
import type { SearchExecutor } from "./search-executor.js";
import type { QueryTranslator } from "./translator.js";

const log = logger.child("pipeline");

export interface PipelineStages {
  translator: QueryTranslator;
  search: SearchExecutor;
  advisor: RemediationAdvisor;
}

/**
 * Sequences translator → search → advisor for one question. Any stage
 * that throws aborts the invocation; no partial report is produced.
 */
export class PipelineOrchestrator {
  private readonly stages: PipelineStages;
  private readonly clock: Clock;

  constructor(stages: PipelineStages, clock: Clock = systemClock) {
    this.stages = stages;
    this.clock = clock;
  }

  async execute(question: string, limit: number = DEFAULT_RESULT_LIMIT): Promise<PipelineRun> {
    if (question.trim() === "") {
      throw new InvalidInputError("Query cannot be empty");
    }

    const total = new Stopwatch(this.clock);

    const translated = await total.lap(() => this.stages.translator.translate(question));
    const translation = translated.value;
    if (translation.status === "degraded") {
      log.warn("Continuing with placeholder query", { reason: translation.reason });
    }

    const searched = await total.lap(() =>
      this.stages.search.execute(translation.query.searchQuery, limit),
    );
    const hosts = searched.value;

    const advised = await total.lap(() => this.stages.advisor.adviseAll(hosts));
    const remediations = advised.value;

    const report = formatReport(translation.query, hosts, remediations);

    const timings = {
      total: total.elapsed(),
      translator: translated.seconds,
      search: searched.seconds,
      advisor: advised.seconds,
    };
    log.info("Pipeline complete", {
      hosts: hosts.length,
      degradedRemediations: remediations.filter((r) => r.status === "degraded").length,
      ...timings,
    });

    return { question, translation, hosts, remediations, timings, report };
  }

  /** Formatted guidance text only */
  async run(question: string, limit: number = DEFAULT_RESULT_LIMIT): Promise<string> {
    const result = await this.execute(question, limit);
    return result.report;
  }

  /** Never throws; failures come back classified by kind */
  async tryExecute(question: string, limit: number = DEFAULT_RESULT_LIMIT): Promise<PipelineResult> {
    try {
      return { ok: true, run: await this.execute(question, limit) };
    } catch (err: unknown) {
      return { ok: false, error: toPipelineError(err) };
    }
  }
}
