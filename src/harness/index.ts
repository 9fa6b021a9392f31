// ─── Harness Module Exports ──────────────────────────────────────────

export { LoadTester, planInvocations, analyzeLoadResults } from "./load-tester.js";
export type { PipelineRunner, LoadTesterOptions } from "./load-tester.js";
export { Evaluator, analyzeTimings } from "./evaluator.js";
export type { EvaluatorOptions } from "./evaluator.js";
export {
  saveLoadTestResults,
  saveEvaluationResults,
  readLoadResultsCsv,
  readTimingSamplesCsv,
  findLatestArtifact,
  loadLatestLoadRun,
  loadLatestEvaluationRun,
  formatRunTimestamp,
} from "./artifacts.js";
export type { ArtifactPaths, LatestLoadRun, LatestEvaluationRun } from "./artifacts.js";
export { formatLoadAnalysis, formatEvaluationAnalysis } from "./console-report.js";
export { COMMANDS, readQueriesFile } from "./commands.js";
export type { Command, CommandContext } from "./commands.js";
