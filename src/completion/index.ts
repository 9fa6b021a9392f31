// ─── Completion Module Exports ───────────────────────────────────────

export { StubProvider, OpenAICompatibleProvider, parseChatCompletion } from "./provider.js";
export type {
  CompletionProvider,
  CompletionRequestConfig,
  CompletionMessage,
  CompletionResult,
  StubResponder,
} from "./provider.js";
export { TRANSLATOR_SYSTEM_PROMPT, REMEDIATION_SYSTEM_PROMPT, buildRemediationPrompt } from "./prompt.js";
