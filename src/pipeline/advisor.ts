import type { CompletionProvider, CompletionRequestConfig } from "../completion/provider.js";
import { REMEDIATION_SYSTEM_PROMPT, buildRemediationPrompt } from "../completion/prompt.js";
import { describeError } from "../errors.js";
import { REMEDIATION_FAILED_TEXT } from "../types.js";
import type { HostRecord, RemediationOutcome } from "../types.js";
import { logger } from "../utils/logger.js";

const log = logger.child("advisor");

export interface RemediationAdvisorOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Asks the completion service for remediation steps, one host at a time.
 * A failure for one host degrades only that host's text.
 */
export class RemediationAdvisor {
  private readonly provider: CompletionProvider;
  private readonly config: CompletionRequestConfig;

  constructor(provider: CompletionProvider, options: RemediationAdvisorOptions) {
    this.provider = provider;
    this.config = {
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    };
  }

  async advise(record: HostRecord): Promise<RemediationOutcome> {
    try {
      const result = await this.provider.complete(
        [
          { role: "system", content: REMEDIATION_SYSTEM_PROMPT },
          { role: "user", content: buildRemediationPrompt(record) },
        ],
        this.config,
      );
      if (result.content.trim() === "") {
        return this.degraded(record, "Completion service returned an empty reply");
      }
      return { status: "ok", text: result.content };
    } catch (err: unknown) {
      return this.degraded(record, describeError(err));
    }
  }

  /** Sequential; output index i always belongs to `records[i]` */
  async adviseAll(records: readonly HostRecord[]): Promise<RemediationOutcome[]> {
    const outcomes: RemediationOutcome[] = [];
    for (const record of records) {
      outcomes.push(await this.advise(record));
    }
    return outcomes;
  }

  private degraded(record: HostRecord, reason: string): RemediationOutcome {
    log.warn("Could not generate remediation", { address: record.address, error: reason });
    return { status: "degraded", text: REMEDIATION_FAILED_TEXT, reason };
  }
}
