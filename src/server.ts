import { Hono } from "hono";
import { InvalidInputError, describeError } from "./errors.js";
import type { PipelineOrchestrator } from "./pipeline/orchestrator.js";
import { isValidLimit } from "./pipeline/search-executor.js";
import type { VulnGuideConfig } from "./types.js";
import { logger } from "./utils/logger.js";

const log = logger.child("http");

export const SERVICE_VERSION = "1.0.0";

export interface QueryRequestBody {
  query: string;
  limit?: number;
}

export interface AppDependencies {
  pipeline: Pick<PipelineOrchestrator, "run">;
  server: Pick<VulnGuideConfig["server"], "defaultLimit" | "maxLimit">;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a POST /query body. Throws InvalidInputError with the text
 * returned to the client.
 */
export function parseQueryRequest(
  body: unknown,
  limits: AppDependencies["server"],
): Required<QueryRequestBody> {
  if (!isRecord(body)) {
    throw new InvalidInputError("Request body must be a JSON object");
  }
  const { query, limit } = body;
  if (typeof query !== "string" || query.trim() === "") {
    throw new InvalidInputError("Query cannot be empty");
  }
  if (limit === undefined || limit === null) {
    return { query, limit: limits.defaultLimit };
  }
  if (!isValidLimit(limit) || limit > limits.maxLimit) {
    throw new InvalidInputError(`limit must be an integer between 1 and ${limits.maxLimit}`);
  }
  return { query, limit };
}

export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.onError((err, c) => {
    log.error("Unhandled request error", { path: c.req.path, error: err.message });
    return c.json({ detail: "Internal server error" }, 500);
  });

  app.get("/health", (c) => c.json({ status: "ok", version: SERVICE_VERSION }));

  app.post("/query", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ detail: "Request body must be valid JSON" }, 400);
    }

    let request: Required<QueryRequestBody>;
    try {
      request = parseQueryRequest(body, deps.server);
    } catch (err: unknown) {
      return c.json({ detail: describeError(err) }, 400);
    }

    try {
      const guidance = await deps.pipeline.run(request.query, request.limit);
      return c.json({ guidance });
    } catch (err: unknown) {
      const message = describeError(err);
      log.error("Error processing query", { query: request.query, error: message });
      return c.json({ detail: `Error processing query: ${message}` }, 500);
    }
  });

  return app;
}
