import type { ErrorKind } from "./types.js";

export class TokenVeilError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TokenVeilError";
  }
}

/** Malformed input or session id. */
export class ValidationError extends TokenVeilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends TokenVeilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "NOT_FOUND", context);
    this.name = "NotFoundError";
  }
}

/** Internal tokenization or reconstruction failure. */
export class PrivacyError extends TokenVeilError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, "PRIVACY_ERROR", context, options);
    this.name = "PrivacyError";
  }
}

export class CircuitBreakerOpenError extends TokenVeilError {
  constructor(public readonly breaker: string) {
    super(`Circuit breaker '${breaker}' is OPEN`, "CIRCUIT_OPEN", { breaker });
    this.name = "CircuitBreakerOpenError";
  }
}

/** A manual breaker reset could not be carried out. */
export class RecoveryError extends TokenVeilError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, "RECOVERY_ERROR", context, options);
    this.name = "RecoveryError";
  }
}

export class TimeoutError extends TokenVeilError {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`, "TIMEOUT", { timeoutMs });
    this.name = "TimeoutError";
  }
}

/** Classify any thrown value for per-item batch reporting. */
export function errorKind(err: unknown): ErrorKind {
  if (err instanceof ValidationError) return "ValidationError";
  if (err instanceof NotFoundError) return "NotFoundError";
  if (err instanceof CircuitBreakerOpenError) return "CircuitBreakerOpenError";
  if (err instanceof RecoveryError) return "RecoveryError";
  if (err instanceof TimeoutError) return "TimeoutError";
  return "PrivacyError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** An intelligence generator answered badly: non-200, bad JSON, wrong shape. */
export class GeneratorError extends TokenVeilError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, "GENERATOR_ERROR", context, options);
    this.name = "GeneratorError";
  }
}
