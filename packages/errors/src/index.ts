export { AppError } from "./app-error.js";
export type { AppErrorOptions, SerializedAppError } from "./app-error.js";

export {
  ValidationError,
  ExternalServiceError,
  SourceUnavailableError,
  EmptyCorpusError,
  RetrievalEmptyError,
  GenerationFailureError,
  TimeoutError,
  describeError,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";

export { withTimeout } from "./timeout.js";
