import { OpenAICompatibleProvider } from "./completion/index.js";
import type { CompletionProvider } from "./completion/index.js";
import {
  PipelineOrchestrator,
  QueryTranslator,
  RemediationAdvisor,
  SearchExecutor,
} from "./pipeline/index.js";
import { ShodanSearchClient } from "./search/index.js";
import type { SearchClient } from "./search/index.js";
import type { VulnGuideConfig } from "./types.js";

export interface Collaborators {
  completion: CompletionProvider;
  search: SearchClient;
}

/**
 * Build the real upstream clients once per process. Tests pass their
 * own collaborators to `createPipeline` instead.
 */
export function createCollaborators(config: VulnGuideConfig): Collaborators {
  return {
    completion: new OpenAICompatibleProvider({
      apiKey: config.completion.apiKey,
      endpoint: config.completion.endpoint,
      timeoutMs: config.completion.timeoutMs,
    }),
    search: new ShodanSearchClient({
      apiKey: config.search.apiKey,
      endpoint: config.search.endpoint,
      timeoutMs: config.search.timeoutMs,
    }),
  };
}

export function createPipeline(
  config: VulnGuideConfig,
  collaborators: Collaborators,
): PipelineOrchestrator {
  const { temperature, maxTokens } = config.completion;
  return new PipelineOrchestrator({
    translator: new QueryTranslator(collaborators.completion, {
      model: config.completion.model,
      temperature,
      maxTokens,
    }),
    search: new SearchExecutor(collaborators.search),
    advisor: new RemediationAdvisor(collaborators.completion, {
      model: config.completion.remediationModel,
      temperature,
      maxTokens,
    }),
  });
}
