import type { VulnGuideConfig } from "./types.js";
import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";

const DEFAULT_CONFIG_PATH = "vulnguide.config.json";

export const DEFAULT_QUERIES: string[] = [
  "Find vulnerable Apache servers in Germany",
  "Show me exposed MongoDB databases in the US",
  "Find IoT devices with default passwords",
  "Search for vulnerable WordPress sites in Canada",
  "Find exposed Jenkins servers",
];

export const DEFAULT_CONFIG: VulnGuideConfig = {
  completion: {
    model: "gpt-3.5-turbo",
    remediationModel: "gpt-3.5-turbo-0125",
    apiKey: "",
    temperature: 0.7,
    maxTokens: 500,
    timeoutMs: 60_000,
  },
  search: {
    endpoint: "https://api.shodan.io",
    apiKey: "",
    timeoutMs: 30_000,
  },
  server: {
    host: "0.0.0.0",
    port: 8000,
    defaultLimit: 5,
    maxLimit: 100,
  },
  harness: {
    loadOutputDir: "load_test_results",
    evaluationOutputDir: "evaluation_results",
    concurrentUsers: 10,
    iterations: 10,
    cooldownMs: 1000,
    queries: DEFAULT_QUERIES,
  },
};

export function loadConfig(overridePath?: string): VulnGuideConfig {
  const configPath = resolve(overridePath ?? DEFAULT_CONFIG_PATH);
  let fileConfig: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    if (!isPlainObject(parsed)) {
      throw new Error(`Config file ${configPath} must contain a JSON object`);
    }
    fileConfig = parsed;
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), fileConfig);
  const completion = section(merged, "completion");
  const search = section(merged, "search");
  const server = section(merged, "server");
  const harness = section(merged, "harness");
  const env = process.env;

  return {
    completion: {
      model:
        env.OPENAI_MODEL ||
        readString(completion.model, DEFAULT_CONFIG.completion.model),
      remediationModel:
        env.OPENAI_REMEDIATION_MODEL ||
        readString(completion.remediationModel, DEFAULT_CONFIG.completion.remediationModel),
      endpoint: env.OPENAI_BASE_URL || readOptionalString(completion.endpoint),
      apiKey: env.OPENAI_API_KEY ?? "",
      temperature: readNumber(completion.temperature, DEFAULT_CONFIG.completion.temperature),
      maxTokens: readNumber(completion.maxTokens, DEFAULT_CONFIG.completion.maxTokens),
      timeoutMs: readNumber(completion.timeoutMs, DEFAULT_CONFIG.completion.timeoutMs),
    },
    search: {
      endpoint:
        env.SHODAN_BASE_URL || readString(search.endpoint, DEFAULT_CONFIG.search.endpoint),
      apiKey: env.SHODAN_API_KEY ?? "",
      timeoutMs: readNumber(search.timeoutMs, DEFAULT_CONFIG.search.timeoutMs),
    },
    server: {
      host: env.HOST || readString(server.host, DEFAULT_CONFIG.server.host),
      port: envInt("PORT") ?? readNumber(server.port, DEFAULT_CONFIG.server.port),
      defaultLimit: readNumber(server.defaultLimit, DEFAULT_CONFIG.server.defaultLimit),
      maxLimit: readNumber(server.maxLimit, DEFAULT_CONFIG.server.maxLimit),
    },
    harness: {
      loadOutputDir: readString(harness.loadOutputDir, DEFAULT_CONFIG.harness.loadOutputDir),
      evaluationOutputDir: readString(
        harness.evaluationOutputDir,
        DEFAULT_CONFIG.harness.evaluationOutputDir,
      ),
      concurrentUsers: readNumber(
        harness.concurrentUsers,
        DEFAULT_CONFIG.harness.concurrentUsers,
      ),
      iterations: readNumber(harness.iterations, DEFAULT_CONFIG.harness.iterations),
      cooldownMs:
        envInt("VULNGUIDE_COOLDOWN_MS") ??
        readNumber(harness.cooldownMs, DEFAULT_CONFIG.harness.cooldownMs),
      queries: readStringArray(harness.queries, DEFAULT_CONFIG.harness.queries),
    },
  };
}

/**
 * Throw if a real upstream client is about to be built without its key.
 */
export function assertServiceCredentials(config: VulnGuideConfig): void {
  if (!config.completion.apiKey) {
    throw new Error("OPENAI_API_KEY not found in environment variables");
  }
  if (!config.search.apiKey) {
    throw new Error("SHODAN_API_KEY not found in environment variables");
  }
}

function envInt(key: string): number | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const n = parseInt(value, 10);
  return isNaN(n) || n < 0 ? undefined : n;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(config: VulnGuideConfig): Record<string, unknown> {
  return { ...config };
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isPlainObject(value) ? value : {};
}

function readString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function readOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function readStringArray(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return [...fallback];
  return value.filter((v): v is string => typeof v === "string");
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}
