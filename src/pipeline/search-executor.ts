import { InvalidInputError } from "../errors.js";
import type { SearchClient } from "../search/client.js";
import { normalizeHostRecord } from "../search/normalizer.js";
import type { HostRecord } from "../types.js";
import { logger } from "../utils/logger.js";

const log = logger.child("search");

export const DEFAULT_RESULT_LIMIT = 5;

export function isValidLimit(limit: unknown): limit is number {
  return typeof limit === "number" && Number.isInteger(limit) && limit > 0;
}

/**
 * Runs a search query and returns at most `limit` normalized host records
 * in the order the index ranked them.
 */
export class SearchExecutor {
  private readonly client: SearchClient;

  constructor(client: SearchClient) {
    this.client = client;
  }

  async execute(query: string, limit: number = DEFAULT_RESULT_LIMIT): Promise<HostRecord[]> {
    if (!isValidLimit(limit)) {
      throw new InvalidInputError(`Result limit must be a positive integer, got ${limit}`);
    }

    const matches = await this.client.search(query, limit);
    const records = matches.slice(0, limit).map(normalizeHostRecord);

    log.info("Search complete", {
      client: this.client.name,
      matches: matches.length,
      returned: records.length,
    });
    return records;
  }
}
