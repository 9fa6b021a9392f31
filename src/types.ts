import type { PipelineError, PipelineErrorKind } from "./errors.js";

// ─── Sentinels ───────────────────────────────────────────────────────

/** Placeholder for any host field the search index did not return */
export const NOT_AVAILABLE = "N/A";

export const TRANSLATION_FAILED_QUERY = "Error: Could not generate query";
export const TRANSLATION_FAILED_EXPLANATION =
  "The response format was invalid. Please try rephrasing your question.";
export const REMEDIATION_FAILED_TEXT = "Unable to generate solution for this result.";

// ─── Pipeline Data ───────────────────────────────────────────────────

export interface TranslatedQuery {
  readonly searchQuery: string;
  readonly explanation: string;
}

export interface HostRecord {
  /** IP address as reported by the index */
  readonly address: string;
  readonly port: string;
  readonly organization: string;
  /** "<country>, <city>" */
  readonly location: string;
  readonly timestamp: string;
  readonly product: string;
  readonly version: string;
  /** CVE identifiers, upstream order */
  readonly vulnerabilities: readonly string[];
}

export type TranslationOutcome =
  | { readonly status: "ok"; readonly query: TranslatedQuery }
  | { readonly status: "degraded"; readonly query: TranslatedQuery; readonly reason: string };

export type RemediationOutcome =
  | { readonly status: "ok"; readonly text: string }
  | { readonly status: "degraded"; readonly text: string; readonly reason: string };

/** Per-stage wall time of one pipeline invocation, in seconds */
export interface TimingSample {
  readonly total: number;
  readonly translator: number;
  readonly search: number;
  readonly advisor: number;
}

export interface PipelineRun {
  readonly question: string;
  readonly translation: TranslationOutcome;
  readonly hosts: readonly HostRecord[];
  /** Aligned by index with `hosts` */
  readonly remediations: readonly RemediationOutcome[];
  readonly timings: TimingSample;
  readonly report: string;
}

export type PipelineResult =
  | { readonly ok: true; readonly run: PipelineRun }
  | { readonly ok: false; readonly error: PipelineError };

// ─── Harness Data ────────────────────────────────────────────────────

export interface ConcurrentQueryResult {
  readonly query: string;
  /** Seconds from launch to completion or failure */
  readonly totalTime: number;
  readonly success: boolean;
  readonly error?: string;
  readonly errorKind?: PipelineErrorKind;
}

export interface ResponseTimeStats {
  readonly mean: number;
  readonly median: number;
  readonly stdDev: number;
  readonly min: number;
  readonly max: number;
}

export interface LoadTestAnalysis {
  readonly totalQueries: number;
  readonly successfulQueries: number;
  readonly failedQueries: number;
  /** Percentage, 0–100 */
  readonly successRate: number;
  readonly responseTimes: ResponseTimeStats & { readonly p95: number };
}

export interface EvaluationAnalysis {
  readonly total: ResponseTimeStats;
  /** Mean seconds per stage */
  readonly components: {
    readonly translator: number;
    readonly search: number;
    readonly advisor: number;
  };
}

// ─── Configuration ───────────────────────────────────────────────────

export interface VulnGuideConfig {
  completion: {
    /** Model used to translate questions into search queries */
    model: string;
    /** Model used for remediation guidance */
    remediationModel: string;
    /** OpenAI-compatible base URL; the provider default applies when omitted */
    endpoint?: string;
    /** OPENAI_API_KEY: read from env, never stored in the config file */
    apiKey: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };

  search: {
    /** Shodan REST base URL */
    endpoint: string;
    /** SHODAN_API_KEY: read from env, never stored in the config file */
    apiKey: string;
    timeoutMs: number;
  };

  server: {
    host: string;
    port: number;
    /** Result count when a request omits `limit` */
    defaultLimit: number;
    /** Largest `limit` a request may ask for */
    maxLimit: number;
  };

  harness: {
    loadOutputDir: string;
    evaluationOutputDir: string;
    concurrentUsers: number;
    iterations: number;
    /** Minimum gap between sequential evaluation invocations; 0 disables it */
    cooldownMs: number;
    queries: string[];
  };
}
