/**
 * Error taxonomy.
 *
 * Only ConfigError and CheckpointError abort a run. Page-scoped fetch errors
 * are caught by the orchestrator; record skips and PDF source failures are
 * returned as values and never thrown.
 */

export type HarvestErrorCode =
  | "CONFIG"
  | "INVALID_RANGE"
  | "INVALID_FORMAT"
  | "FETCH"
  | "RATE_LIMIT_EXCEEDED"
  | "CHECKPOINT"
  | "ENHANCEMENT";

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Mutually exclusive or malformed options. Reported before any I/O. */
export class ConfigError extends HarvestError {
  constructor(message: string, code: HarvestErrorCode = "CONFIG") {
    super(code, message);
  }
}

/** A range whose start lies after its end. */
export class InvalidRangeError extends ConfigError {
  constructor(message: string) {
    super(message, "INVALID_RANGE");
  }
}

/** A time option that does not match its required format. */
export class InvalidFormatError extends ConfigError {
  constructor(message: string) {
    super(message, "INVALID_FORMAT");
  }
}

/** A page could not be fetched. The orchestrator skips the page. */
export class FetchError extends HarvestError {
  readonly offset: number;
  readonly status: number | null;

  constructor(message: string, offset: number, status: number | null = null, cause?: unknown) {
    super("FETCH", message, { cause });
    this.offset = offset;
    this.status = status;
  }
}

/** The API kept answering 429 after all retries. The orchestrator stops paging. */
export class RateLimitExceededError extends HarvestError {
  readonly offset: number;
  readonly retries: number;

  constructor(offset: number, retries: number) {
    super("RATE_LIMIT_EXCEEDED", `Rate limit still exceeded after ${retries} retries (offset ${offset})`);
    this.offset = offset;
    this.retries = retries;
  }
}

/** Writing a checkpoint or export failed. Fatal. */
export class CheckpointError extends HarvestError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("CHECKPOINT", `Failed to write ${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

/** Query enhancement produced no usable query. Callers fall back to the raw query. */
export class EnhancementError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super("ENHANCEMENT", message, { cause });
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
