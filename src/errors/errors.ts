/**
 * Application error classes
 *
 * Exceptions are reserved for structurally invalid input and failed
 * external calls. "Not covered" and "not verified" are result fields,
 * never errors.
 */

export type AppErrorCode =
  | "INVALID_INPUT"
  | "EXTERNAL_CAPABILITY"
  | "EMBEDDING_FAILED"
  | "CAPABILITY_TIMEOUT"
  | "NO_EVIDENCE"
  | "SERIALIZATION"
  | "CONFIG";

/**
 * Base class carrying a stable machine-readable code
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.code = code;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Empty bullet text, empty embedding batch, dimension mismatch, malformed
 * profile... Caller's responsibility; never retried.
 */
export class InvalidInputError extends AppError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/**
 * An embedding/completion call failed or timed out
 */
export class ExternalCapabilityError extends AppError {
  public readonly capability: string;

  constructor(
    capability: string,
    message: string,
    options?: { cause?: unknown; code?: AppErrorCode },
  ) {
    super(options?.code ?? "EXTERNAL_CAPABILITY", message, {
      cause: options?.cause,
    });
    this.name = "ExternalCapabilityError";
    this.capability = capability;
  }
}

/**
 * Embedding generation failed. Aborts the coverage computation.
 */
export class EmbeddingError extends ExternalCapabilityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding", message, { cause: options?.cause, code: "EMBEDDING_FAILED" });
    this.name = "EmbeddingError";
  }
}

export class CapabilityTimeoutError extends ExternalCapabilityError {
  public readonly timeoutMs: number;

  constructor(capability: string, timeoutMs: number) {
    super(capability, `${capability} call timed out after ${timeoutMs}ms`, {
      code: "CAPABILITY_TIMEOUT",
    });
    this.name = "CapabilityTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Generation was requested but no requirement is covered by evidence
 */
export class NoEvidenceError extends AppError {
  constructor(message = "No covered requirements found. Cannot generate bullets without evidence.") {
    super("NO_EVIDENCE", message);
    this.name = "NoEvidenceError";
  }
}

/**
 * A persisted/serialized payload does not match the expected shape
 */
export class SerializationError extends AppError {
  constructor(message: string) {
    super("SERIALIZATION", `Invalid payload: ${message}`);
    this.name = "SerializationError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super("CONFIG", `Configuration error: ${message}`);
    this.name = "ConfigError";
  }
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
