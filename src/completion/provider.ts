import { UpstreamTransportError, describeError } from "../errors.js";

// ─── Completion Provider Interface ───────────────────────────────────

export interface CompletionRequestConfig {
  /** Model name / deployment (e.g. "gpt-3.5-turbo") */
  model: string;
  temperature: number;
  /** Max tokens for the response */
  maxTokens: number;
  /** Ask the provider for a JSON object reply */
  jsonResponse?: boolean;
}

export interface CompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionResult {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

/**
 * Chat-style completion service. Implementations own authentication and
 * raise `UpstreamTransportError` when the service rejects a request.
 */
export interface CompletionProvider {
  readonly name: string;
  complete(messages: CompletionMessage[], config: CompletionRequestConfig): Promise<CompletionResult>;
}

// ─── Stub Provider ───────────────────────────────────────────────────

export type StubResponder = (
  messages: CompletionMessage[],
  config: CompletionRequestConfig,
) => string | Promise<string>;

/**
 * Returns a fixed reply, or whatever the responder computes.
 * Records every call so tests can count collaborator use.
 */
export class StubProvider implements CompletionProvider {
  readonly name = "stub";
  readonly calls: Array<{ messages: CompletionMessage[]; config: CompletionRequestConfig }> = [];
  private readonly responder: StubResponder;

  constructor(response: string | StubResponder) {
    this.responder = typeof response === "string" ? () => response : response;
  }

  async complete(messages: CompletionMessage[], config: CompletionRequestConfig): Promise<CompletionResult> {
    this.calls.push({ messages, config });
    const content = await this.responder(messages, config);
    return {
      content,
      usage: { promptTokens: 0, completionTokens: 0 },
    };
  }
}

// ─── OpenAI-compatible Provider ──────────────────────────────────────

export interface OpenAICompatibleProviderOptions {
  apiKey: string;
  /** Base URL; defaults to the public OpenAI API */
  endpoint?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Pull the first choice and token usage out of a chat completions body */
export function parseChatCompletion(data: unknown): CompletionResult {
  if (!isRecord(data)) return { content: "" };
  const choices = Array.isArray(data.choices) ? data.choices : [];
  const first: unknown = choices[0];
  const message = isRecord(first) && isRecord(first.message) ? first.message : undefined;
  const content = typeof message?.content === "string" ? message.content : "";

  const usage = isRecord(data.usage) ? data.usage : undefined;
  if (
    usage &&
    typeof usage.prompt_tokens === "number" &&
    typeof usage.completion_tokens === "number"
  ) {
    return {
      content,
      usage: {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
      },
    };
  }
  return { content };
}

/**
 * Works with OpenAI, Azure OpenAI, GitHub Models, and any API that
 * implements the OpenAI chat completions interface.
 */
export class OpenAICompatibleProvider implements CompletionProvider {
  readonly name = "openai-compatible";
  private readonly options: OpenAICompatibleProviderOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAICompatibleProviderOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(messages: CompletionMessage[], config: CompletionRequestConfig): Promise<CompletionResult> {
    const endpoint = this.options.endpoint ?? "https://api.openai.com/v1";
    const url = `${endpoint.replace(/\/+$/, "")}/chat/completions`;

    if (!this.options.apiKey) {
      throw new UpstreamTransportError(
        "completion",
        "Completion API key is required. Set OPENAI_API_KEY env var.",
      );
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "Authorization": `Bearer ${this.options.apiKey}`,
          },
          body: JSON.stringify({
            model: config.model,
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            max_tokens: config.maxTokens,
            temperature: config.temperature,
            ...(config.jsonResponse ? { response_format: { type: "json_object" } } : {}),
          }),
          signal: controller.signal,
        });
      } catch (err: unknown) {
        throw new UpstreamTransportError(
          "completion",
          `Completion request failed: ${describeError(err)}`,
          { cause: err },
        );
      }

      if (!response.ok) {
        const errorText = await response.text().catch((err: unknown) => describeError(err));
        throw new UpstreamTransportError(
          "completion",
          `Completion API error ${response.status}: ${errorText.slice(0, 200)}`,
          { status: response.status },
        );
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (err: unknown) {
        throw new UpstreamTransportError(
          "completion",
          `Completion API returned an unreadable body: ${describeError(err)}`,
          { status: response.status, cause: err },
        );
      }
      return parseChatCompletion(data);
    } finally {
      clearTimeout(timeout);
    }
  }
}
