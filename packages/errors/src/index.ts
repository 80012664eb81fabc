export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  UnauthorizedError,
  ConflictError,
  RateLimitedError,
  ValidationError,
  InvalidKeyError,
  TransientProviderError,
  FatalProviderError,
  EmbeddingProviderError,
  StoreConnectionError,
  MissingCapabilityError,
  SchemaError,
  PersistenceError,
  ParsingError,
  EmptyInputError,
  UnsupportedFormatError,
  FileTooLargeError,
  CancelledError,
} from "./errors.js";
export type { ErrorContext } from "./errors.js";

export { withRetry, isRetryable, calculateDelay, sleep, RetryExhaustedError } from "./retry.js";
export type { RetryOptions, RetryAttemptInfo } from "./retry.js";
