import type { PipelineResult } from "../types/common";

export type ShieldErrorCode =
  | "CONFIGURATION_INVALID"
  | "VALIDATION_FAILED"
  | "ENCODING_INVALID"
  | "SECURITY_BLOCKED";

/**
 * Structured error carrying a machine-readable code. `recoverable` tells
 * callers whether the next message can still go through.
 */
export class ShieldError extends Error {
  readonly code: ShieldErrorCode;
  readonly recoverable: boolean;
  readonly details?: unknown;

  constructor(
    code: ShieldErrorCode,
    message: string,
    options: { recoverable?: boolean; details?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ShieldError";
    this.code = code;
    this.recoverable = options.recoverable ?? code !== "CONFIGURATION_INVALID";
    this.details = options.details;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      details: this.details,
    };
  }
}

/** Raised at construction only; a pipeline never exists in an invalid state. */
export class ConfigurationError extends ShieldError {
  constructor(message: string, details?: unknown, cause?: unknown) {
    super("CONFIGURATION_INVALID", message, { recoverable: false, details, cause });
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends ShieldError {
  constructor(message: string, details?: unknown, code: ShieldErrorCode = "VALIDATION_FAILED") {
    super(code, message, { recoverable: true, details });
    this.name = "ValidationError";
  }
}

/** Input is not well-formed text (lone UTF-16 surrogate). */
export class EncodingError extends ValidationError {
  constructor(message: string, details?: unknown) {
    super(message, details, "ENCODING_INVALID");
    this.name = "EncodingError";
  }
}

export class SecurityBlockedError extends ShieldError {
  readonly result: PipelineResult;

  constructor(result: PipelineResult) {
    super("SECURITY_BLOCKED", `Blocked: ${result.reason}`, {
      recoverable: true,
      details: { reason: result.reason, level: result.level, categories: result.categories },
    });
    this.name = "SecurityBlockedError";
    this.result = result;
  }
}
