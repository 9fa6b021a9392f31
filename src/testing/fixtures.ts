// ─── Shared Test Fixtures ────────────────────────────────────────────

import { TRANSLATOR_SYSTEM_PROMPT } from "../completion/prompt.js";
import { StubProvider } from "../completion/provider.js";
import type { CompletionMessage } from "../completion/provider.js";
import { DEFAULT_CONFIG } from "../config.js";
import { StubSearchClient } from "../search/client.js";
import type { StubSearchResponder } from "../search/client.js";
import { createPipeline } from "../services.js";
import type { PipelineOrchestrator } from "../pipeline/orchestrator.js";
import type { HostRecord } from "../types.js";

export function makeHost(overrides?: Partial<HostRecord>): HostRecord {
  return {
    address: "198.51.100.7",
    port: "8080",
    organization: "Example Hosting",
    location: "Germany, Berlin",
    timestamp: "2024-11-01T10:00:00.000000",
    product: "Apache httpd",
    version: "2.4.49",
    vulnerabilities: ["CVE-2021-41773"],
    ...overrides,
  };
}

/** Raw Shodan-style match as the index returns it */
export function makeRawMatch(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    ip_str: "198.51.100.7",
    port: 8080,
    org: "Example Hosting",
    location: { country_name: "Germany", city: "Berlin" },
    timestamp: "2024-11-01T10:00:00.000000",
    product: "Apache httpd",
    version: "2.4.49",
    vulns: { "CVE-2021-41773": { cvss: 7.5 } },
    ...overrides,
  };
}

export function translationReply(searchQuery: string, explanation: string): string {
  return JSON.stringify({ shodan_query: searchQuery, explanation });
}

export function isTranslatorCall(messages: CompletionMessage[]): boolean {
  return messages[0]?.content === TRANSLATOR_SYSTEM_PROMPT;
}

export interface StubPipelineOptions {
  /** Translator reply text */
  reply?: string;
  matches?: unknown[] | StubSearchResponder;
  /** Remediation text, or a function of the advisor's user prompt */
  remediation?: string | ((prompt: string) => string);
}

/**
 * Real orchestrator wired to in-process stubs. The returned stubs record
 * every call made to them.
 */
export function buildStubPipeline(options: StubPipelineOptions = {}): {
  pipeline: PipelineOrchestrator;
  completion: StubProvider;
  search: StubSearchClient;
} {
  const reply = options.reply ?? translationReply("apache country:DE", "Apache servers in Germany.");
  const remediation = options.remediation ?? "Upgrade to the latest release.";

  const completion = new StubProvider((messages) => {
    if (isTranslatorCall(messages)) return reply;
    const prompt = messages[1]?.content ?? "";
    return typeof remediation === "string" ? remediation : remediation(prompt);
  });
  const search = new StubSearchClient(options.matches ?? [makeRawMatch()]);
  const pipeline = createPipeline(DEFAULT_CONFIG, { completion, search });
  return { pipeline, completion, search };
}
