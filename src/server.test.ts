import { SERVICE_VERSION, createApp, parseQueryRequest } from "./server.js";
import { InvalidInputError, UpstreamTransportError } from "./errors.js";
import { buildStubPipeline } from "./testing/fixtures.js";

const LIMITS = { defaultLimit: 5, maxLimit: 100 };

function post(body: string): RequestInit {
  return { method: "POST", headers: { "Content-Type": "application/json" }, body };
}

describe("parseQueryRequest", () => {
  it("applies the default limit", () => {
    expect(parseQueryRequest({ query: "Find nginx" }, LIMITS)).toEqual({ query: "Find nginx", limit: 5 });
  });

  it("keeps an explicit limit", () => {
    expect(parseQueryRequest({ query: "Find nginx", limit: 3 }, LIMITS)).toEqual({
      query: "Find nginx",
      limit: 3,
    });
  });

  it("rejects a blank query", () => {
    expect(() => parseQueryRequest({ query: " " }, LIMITS)).toThrow(new InvalidInputError("Query cannot be empty"));
  });

  it("rejects limits outside the allowed range", () => {
    for (const limit of [0, -1, 1.5, 101, "5"]) {
      expect(() => parseQueryRequest({ query: "q", limit }, LIMITS)).toThrow(
        "limit must be an integer between 1 and 100",
      );
    }
  });

  it("rejects a body that is not an object", () => {
    expect(() => parseQueryRequest(["q"], LIMITS)).toThrow("Request body must be a JSON object");
  });
});

describe("HTTP app", () => {
  it("reports health", async () => {
    const app = createApp({ pipeline: buildStubPipeline().pipeline, server: LIMITS });

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", version: SERVICE_VERSION });
  });

  it("returns guidance for a query", async () => {
    const { pipeline, search } = buildStubPipeline();
    const app = createApp({ pipeline, server: LIMITS });

    const res = await app.request("/query", post(JSON.stringify({ query: "Find Apache servers", limit: 2 })));

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toEqual({ guidance: await pipeline.run("Find Apache servers", 2) });
    expect(search.calls[0].limit).toBe(2);
  });

  it("rejects an empty query with 400 before running the pipeline", async () => {
    const { pipeline, completion } = buildStubPipeline();
    const app = createApp({ pipeline, server: LIMITS });

    const res = await app.request("/query", post(JSON.stringify({ query: "" })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "Query cannot be empty" });
    expect(completion.calls).toHaveLength(0);
  });

  it("rejects malformed JSON with 400", async () => {
    const app = createApp({ pipeline: buildStubPipeline().pipeline, server: LIMITS });

    const res = await app.request("/query", post("{not json"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "Request body must be valid JSON" });
  });

  it("maps pipeline failures to 500 with the error text", async () => {
    const { pipeline } = buildStubPipeline({
      matches: () => {
        throw new UpstreamTransportError("search", "Shodan API Error: Invalid API key", { status: 401 });
      },
    });
    const app = createApp({ pipeline, server: LIMITS });

    const res = await app.request("/query", post(JSON.stringify({ query: "Find Apache servers" })));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      detail: "Error processing query: Shodan API Error: Invalid API key",
    });
  });
});
