import { UpstreamTransportError, describeError } from "../errors.js";

// ─── Search Client Interface ─────────────────────────────────────────

/**
 * Device-search index. Returns raw matches in relevance order; their
 * shape is whatever the index sends and is normalized downstream.
 */
export interface SearchClient {
  readonly name: string;
  search(query: string, limit: number): Promise<unknown[]>;
}

// ─── Stub Client ─────────────────────────────────────────────────────

export type StubSearchResponder = (query: string, limit: number) => unknown[] | Promise<unknown[]>;

/** Serves canned matches and records every query it receives */
export class StubSearchClient implements SearchClient {
  readonly name = "stub";
  readonly calls: Array<{ query: string; limit: number }> = [];
  private readonly responder: StubSearchResponder;

  constructor(matches: unknown[] | StubSearchResponder) {
    this.responder = Array.isArray(matches) ? () => matches : matches;
  }

  async search(query: string, limit: number): Promise<unknown[]> {
    this.calls.push({ query, limit });
    return this.responder(query, limit);
  }
}

// ─── Shodan REST Client ──────────────────────────────────────────────

export interface ShodanSearchClientOptions {
  apiKey: string;
  /** Base URL, e.g. "https://api.shodan.io" */
  endpoint: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export class ShodanSearchClient implements SearchClient {
  readonly name = "shodan";
  private readonly options: ShodanSearchClientOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ShodanSearchClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, limit: number): Promise<unknown[]> {
    if (!this.options.apiKey) {
      throw new UpstreamTransportError(
        "search",
        "Shodan API key is required. Set SHODAN_API_KEY env var.",
      );
    }

    const params = new URLSearchParams({
      key: this.options.apiKey,
      query,
      limit: String(limit),
    });
    const url = `${this.options.endpoint.replace(/\/+$/, "")}/shodan/host/search?${params}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err: unknown) {
      throw new UpstreamTransportError("search", `Shodan request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const detail =
        isRecord(body) && typeof body.error === "string" ? body.error : `HTTP ${response.status}`;
      throw new UpstreamTransportError("search", `Shodan API Error: ${detail}`, {
        status: response.status,
      });
    }

    if (!isRecord(body) || !Array.isArray(body.matches)) {
      throw new UpstreamTransportError("search", "Shodan API Error: response has no matches array", {
        status: response.status,
      });
    }

    return body.matches;
  }
}
