// ─── Pipeline Error Kinds ────────────────────────────────────────────

export type PipelineErrorKind =
  | "invalid-input"
  | "upstream-transport"
  | "upstream-format"
  | "internal";

export type UpstreamService = "completion" | "search";

/**
 * Base class for every failure the query pipeline raises on purpose.
 * Harnesses branch on `kind` instead of matching message text.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.kind = kind;
  }
}

/** Empty question, non-positive limit, malformed request body */
export class InvalidInputError extends PipelineError {
  constructor(message: string) {
    super("invalid-input", message);
    this.name = "InvalidInputError";
  }
}

/** Auth, network, quota or HTTP failure from an upstream service */
export class UpstreamTransportError extends PipelineError {
  readonly service: UpstreamService;
  /** HTTP status when the upstream answered at all */
  readonly status?: number;

  constructor(
    service: UpstreamService,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super("upstream-transport", message, { cause: options?.cause });
    this.name = "UpstreamTransportError";
    this.service = service;
    this.status = options?.status;
  }
}

/** Completion reply that does not carry the expected fields */
export class UpstreamFormatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("upstream-format", message, options);
    this.name = "UpstreamFormatError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classify any thrown value. Errors that did not come from the pipeline
 * itself are reported as `internal`.
 */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  return new PipelineError("internal", describeError(err), { cause: err });
}
