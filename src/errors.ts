/**
 * Error taxonomy. Only ConfigurationError is meant to escape to a caller;
 * the other two are converted to user-visible text by the orchestrator.
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;
  }
}

/** A required credential or setting is missing or malformed. Fatal at construction. */
export class ConfigurationError extends AppError {
  readonly code = "CONFIGURATION_ERROR" as const;
  readonly keys: readonly string[];

  constructor(message: string, keys: readonly string[] = []) {
    super(message);
    this.keys = keys;
  }
}

/** Store, index or network failure. */
export class BackendError extends AppError {
  readonly code = "BACKEND_ERROR" as const;
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(`${backend}: ${message}`, options);
    this.backend = backend;
  }

  static from(backend: string, cause: unknown): BackendError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new BackendError(backend, message, { cause });
  }
}

/** The completion capability failed or returned nothing usable. */
export class GenerationError extends AppError {
  readonly code = "GENERATION_ERROR" as const;
}
