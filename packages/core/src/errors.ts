/**
 * Error taxonomy for renter control operations.
 *
 * InputValidationError — the caller sent something unusable. Raised before
 * the engine is touched; the caller resubmits a corrected request.
 *
 * EngineError — the engine refused or failed. Carries the engine's message
 * and a severity: "server" for transfer failures, "client" otherwise.
 */

export type ValidationCode =
  | "invalid_amount"
  | "invalid_count"
  | "invalid_period"
  | "invalid_renew_window"
  | "below_minimum"
  | "relative_path_rejected"
  | "empty_path";

export type EngineErrorCode =
  | "engine_rejected"
  | "path_not_found"
  | "path_exists"
  | "bundle_corrupt"
  | "no_contracts"
  | "transfer_failed"
  | "engine_failure";

export type Severity = "client" | "server";

export class InputValidationError extends Error {
  readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(message);
    this.name = "InputValidationError";
    this.code = code;
  }
}

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly severity: Severity;

  constructor(code: EngineErrorCode, message: string, severity: Severity = "client") {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.severity = severity;
  }

  /** Wrap whatever the engine threw. An EngineError passes through unchanged. */
  static from(err: unknown, fallback: EngineErrorCode): EngineError {
    if (err instanceof EngineError) return err;
    const msg = err instanceof Error ? err.message : String(err);
    return new EngineError(fallback, msg);
  }
}
