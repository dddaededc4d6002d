/**
 * Error taxonomy for the schema Q&A service.
 *
 * Every failure the query pipeline can produce is one of these classes, so the
 * HTTP layer can log it with its type and metadata and reply with its string
 * form. Pipeline stage errors default to status 500.
 */
export type AppErrorType =
  | "AppError"
  | "EmbeddingError"
  | "StorageError"
  | "LLMError"
  | "ConfigurationError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export interface AppErrorOptions {
  statusCode?: number;
  metadata?: AppErrorMetadata;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    options: AppErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.statusCode = options.statusCode ?? 500;
    this.metadata = options.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** The embedding model is unavailable or could not encode the input. */
export class EmbeddingError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "EmbeddingError", options);
  }
}

/** The vector index could not be opened or queried. */
export class StorageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "StorageError", options);
  }
}

export interface LLMErrorOptions extends AppErrorOptions {
  /** HTTP status returned by the LLM backend, when it answered at all. */
  upstreamStatus?: number;
  retryable?: boolean;
}

/** Network failure, non-success status or malformed body from the LLM backend. */
export class LLMError extends AppError {
  public readonly upstreamStatus: number | undefined;
  public readonly retryable: boolean;

  constructor(message: string, options: LLMErrorOptions = {}) {
    super(message, "LLMError", options);
    this.upstreamStatus = options.upstreamStatus;
    this.retryable = options.retryable ?? false;
  }
}

/** Missing or invalid environment configuration. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "ConfigurationError", options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ValidationError", { statusCode: 400, metadata });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): { message: string; name?: string } {
  if (error instanceof Error) {
    return { message: error.message, name: error.name };
  }
  return { message: String(error) };
}
