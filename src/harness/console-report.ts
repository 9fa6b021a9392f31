import chalk from "chalk";
import type { EvaluationAnalysis, LoadTestAnalysis } from "../types.js";

const secs = (n: number): string => n.toFixed(2);

export function formatLoadAnalysis(analysis: LoadTestAnalysis): string[] {
  const t = analysis.responseTimes;
  return [
    chalk.bold("\n=== Load Test Analysis ==="),
    `Total Queries: ${analysis.totalQueries}`,
    `Successful Queries: ${chalk.green(analysis.successfulQueries)}`,
    `Failed Queries: ${analysis.failedQueries > 0 ? chalk.red(analysis.failedQueries) : analysis.failedQueries}`,
    `Success Rate: ${analysis.successRate.toFixed(2)}%`,
    chalk.bold("\nResponse Times (seconds):"),
    `  Mean: ${secs(t.mean)}`,
    `  Median: ${secs(t.median)}`,
    `  95th Percentile: ${secs(t.p95)}`,
    `  Standard Deviation: ${secs(t.stdDev)}`,
    `  Min: ${secs(t.min)}`,
    `  Max: ${secs(t.max)}`,
  ];
}

export function formatEvaluationAnalysis(analysis: EvaluationAnalysis): string[] {
  return [
    chalk.bold("\nEvaluation Results:"),
    `Average Total Response Time: ${secs(analysis.total.mean)} seconds`,
    `Median Response Time: ${secs(analysis.total.median)} seconds`,
    `Standard Deviation: ${secs(analysis.total.stdDev)} seconds`,
    `Fastest / Slowest: ${secs(analysis.total.min)} / ${secs(analysis.total.max)} seconds`,
    chalk.bold("\nComponent Breakdown:"),
    `Query Translation: ${secs(analysis.components.translator)} seconds`,
    `Shodan Search: ${secs(analysis.components.search)} seconds`,
    `Remediation Advice: ${secs(analysis.components.advisor)} seconds`,
  ];
}
