/**
 * Error Types
 *
 * Every error the library raises on its own behalf derives from
 * `SetwiseError`. Errors produced by caller-owned sources are never wrapped.
 */

/**
 * Base class for all library errors.
 */
export class SetwiseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetwiseError";
  }
}

/** Reason codes for argument validation failures. */
export type InvalidArgumentReason =
  | "missing"
  | "not_iterable"
  | "not_function"
  | "invalid_equality"
  | "out_of_range";

/**
 * Thrown synchronously, at call time, when an operation receives an absent
 * or malformed argument.
 */
export class InvalidArgumentError extends SetwiseError {
  constructor(
    readonly operation: string,
    readonly argument: string,
    readonly reason: InvalidArgumentReason,
    detail: string
  ) {
    super(`${operation}: argument "${argument}" ${detail}`);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when a configuration file exists but cannot be loaded.
 */
export class ConfigError extends SetwiseError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "ConfigError";
  }
}
