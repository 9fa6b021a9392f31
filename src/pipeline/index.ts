// ─── Pipeline Module Exports ─────────────────────────────────────────

export { QueryTranslator, parseTranslation, validateTranslation, stripCodeFence } from "./translator.js";
export type { QueryTranslatorOptions } from "./translator.js";
export { SearchExecutor, DEFAULT_RESULT_LIMIT, isValidLimit } from "./search-executor.js";
export { RemediationAdvisor } from "./advisor.js";
export type { RemediationAdvisorOptions } from "./advisor.js";
export { PipelineOrchestrator } from "./orchestrator.js";
export type { PipelineStages } from "./orchestrator.js";
export { formatReport } from "./report.js";
