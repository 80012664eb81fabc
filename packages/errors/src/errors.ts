import { AppError } from "./app-error.js";

export interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized", options?: ErrorContext) {
    super({ message, statusCode: 401, code: "UNAUTHORIZED", ...options });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorContext) {
    super({ message, statusCode: 409, code: "CONFLICT", ...options });
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorContext) {
    super({ message, statusCode: 429, code: "RATE_LIMITED", ...options });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Validation error",
    fields: Record<string, string> = {},
    options?: ErrorContext,
  ) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

/** The provider rejected the API key. Never retried. */
export class InvalidKeyError extends AppError {
  public readonly provider: string;

  constructor(message = "Provider rejected the API key", provider: string, options?: ErrorContext) {
    super({ message, statusCode: 401, code: "INVALID_KEY", ...options });
    this.provider = provider;
  }
}

/** Provider failure that a later attempt may not hit: rate limit, timeout, 5xx, network. */
export class TransientProviderError extends AppError {
  public readonly provider: string;

  constructor(message = "Provider temporarily unavailable", provider: string, options?: ErrorContext) {
    super({ message, statusCode: 503, code: "TRANSIENT_PROVIDER_ERROR", ...options });
    this.provider = provider;
  }
}

/** Provider failure that will recur on retry: bad request, auth, malformed response. */
export class FatalProviderError extends AppError {
  public readonly provider: string;

  constructor(message = "Provider request failed", provider: string, options?: ErrorContext) {
    super({ message, statusCode: 502, code: "FATAL_PROVIDER_ERROR", ...options });
    this.provider = provider;
  }
}

export class EmbeddingProviderError extends AppError {
  public readonly batchIndex: number;
  public readonly attempts: number;

  constructor(
    message: string,
    batchIndex: number,
    attempts: number,
    options?: ErrorContext,
  ) {
    super({
      message,
      statusCode: 502,
      code: "EMBEDDING_PROVIDER_ERROR",
      ...options,
      details: { ...options?.details, batchIndex, attempts },
    });
    this.batchIndex = batchIndex;
    this.attempts = attempts;
  }
}

export class StoreConnectionError extends AppError {
  constructor(message = "Vector store is unreachable", options?: ErrorContext) {
    super({ message, statusCode: 503, code: "STORE_UNREACHABLE", ...options });
  }
}

/** The store is reachable but lacks the vector extension. */
export class MissingCapabilityError extends AppError {
  constructor(message = "Vector store lacks vector support", options?: ErrorContext) {
    super({ message, statusCode: 412, code: "MISSING_CAPABILITY", ...options });
  }
}

export class SchemaError extends AppError {
  constructor(message = "Vector schema unavailable", options?: ErrorContext) {
    super({ message, statusCode: 500, code: "SCHEMA_ERROR", ...options });
  }
}

export class PersistenceError extends AppError {
  constructor(message = "Failed to persist data", options?: ErrorContext) {
    super({ message, statusCode: 500, code: "PERSISTENCE_ERROR", ...options });
  }
}

export class ParsingError extends AppError {
  constructor(message = "Failed to parse document", options?: ErrorContext) {
    super({ message, statusCode: 422, code: "PARSING_ERROR", ...options });
  }
}

export class EmptyInputError extends AppError {
  constructor(message = "Input contains no text", options?: ErrorContext) {
    super({ message, statusCode: 422, code: "EMPTY_INPUT", ...options });
  }
}

export class UnsupportedFormatError extends AppError {
  public readonly extension: string;

  constructor(extension: string, options?: ErrorContext) {
    super({
      message: `Unsupported file format: ${extension || "(none)"}`,
      statusCode: 415,
      code: "UNSUPPORTED_FORMAT",
      ...options,
    });
    this.extension = extension;
  }
}

export class FileTooLargeError extends AppError {
  public readonly limitBytes: number;

  constructor(limitBytes: number, options?: ErrorContext) {
    super({
      message: `File exceeds the ${String(Math.floor(limitBytes / (1024 * 1024)))} MB limit`,
      statusCode: 413,
      code: "FILE_TOO_LARGE",
      ...options,
    });
    this.limitBytes = limitBytes;
  }
}

export class CancelledError extends AppError {
  constructor(message = "Operation cancelled", options?: ErrorContext) {
    super({ message, statusCode: 499, code: "CANCELLED", ...options });
  }
}
