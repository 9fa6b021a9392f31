// ─── Query Translator ────────────────────────────────────────────────

import type { CompletionProvider, CompletionRequestConfig } from "../completion/provider.js";
import { TRANSLATOR_SYSTEM_PROMPT } from "../completion/prompt.js";
import { InvalidInputError, UpstreamFormatError, describeError } from "../errors.js";
import {
  TRANSLATION_FAILED_EXPLANATION,
  TRANSLATION_FAILED_QUERY,
} from "../types.js";
import type { TranslatedQuery, TranslationOutcome } from "../types.js";
import { logger } from "../utils/logger.js";

const log = logger.child("translator");

export interface QueryTranslatorOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Validate that a parsed reply carries both named fields.
 * Returns an array of error messages (empty = valid).
 */
export function validateTranslation(obj: unknown): string[] {
  if (typeof obj !== "object" || obj === null || Array.isArray(obj)) {
    return ["Reply must be a JSON object"];
  }
  const errors: string[] = [];
  if (!("shodan_query" in obj) || typeof obj.shodan_query !== "string" || obj.shodan_query.trim() === "") {
    errors.push("shodan_query must be a non-empty string");
  }
  if (!("explanation" in obj) || typeof obj.explanation !== "string" || obj.explanation.trim() === "") {
    errors.push("explanation must be a non-empty string");
  }
  return errors;
}

interface TranslationReply {
  shodan_query: string;
  explanation: string;
}

function isTranslationReply(obj: unknown): obj is TranslationReply {
  return validateTranslation(obj).length === 0;
}

/** Drop a surrounding ```json fence some models add despite instructions */
export function stripCodeFence(raw: string): string {
  const fenced = /^\s*```[a-zA-Z]*\s*\n([\s\S]*?)\n?```\s*$/.exec(raw);
  return fenced ? fenced[1] : raw.trim();
}

/**
 * Parse a completion reply into a TranslatedQuery, or throw
 * UpstreamFormatError describing what was wrong with it.
 */
export function parseTranslation(content: string): TranslatedQuery {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(content));
  } catch (err: unknown) {
    throw new UpstreamFormatError(`Reply is not valid JSON: ${describeError(err)}`, { cause: err });
  }

  if (!isTranslationReply(parsed)) {
    throw new UpstreamFormatError(
      `Reply is missing fields: ${validateTranslation(parsed).join("; ")}`,
    );
  }

  return {
    searchQuery: parsed.shodan_query.trim(),
    explanation: parsed.explanation.trim(),
  };
}

/**
 * Turns a natural-language question into a Shodan query plus explanation.
 * A reply that cannot be parsed degrades to a visible sentinel query;
 * transport failures propagate.
 */
export class QueryTranslator {
  private readonly provider: CompletionProvider;
  private readonly options: QueryTranslatorOptions;

  constructor(provider: CompletionProvider, options: QueryTranslatorOptions) {
    this.provider = provider;
    this.options = options;
  }

  async translate(question: string): Promise<TranslationOutcome> {
    const text = question.trim();
    if (text === "") {
      throw new InvalidInputError("Empty question provided");
    }

    const config: CompletionRequestConfig = {
      model: this.options.model,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
      jsonResponse: true,
    };

    const result = await this.provider.complete(
      [
        { role: "system", content: TRANSLATOR_SYSTEM_PROMPT },
        { role: "user", content: question },
      ],
      config,
    );

    if (result.usage) {
      log.debug("Token usage", result.usage);
    }

    try {
      return { status: "ok", query: parseTranslation(result.content) };
    } catch (err: unknown) {
      if (!(err instanceof UpstreamFormatError)) throw err;
      log.warn("Completion reply was not a valid query translation", {
        error: err.message,
      });
      return {
        status: "degraded",
        query: {
          searchQuery: TRANSLATION_FAILED_QUERY,
          explanation: TRANSLATION_FAILED_EXPLANATION,
        },
        reason: err.message,
      };
    }
  }
}
