import { withRetry, withTimeout } from "@scholarqa/errors";
import type { RetryAttempt } from "@scholarqa/errors";

/**
 * Wraps one call to an external service. `operation` names the call in
 * timeout errors and logs.
 */
export type ServiceCall = <T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
) => Promise<T>;

const DEFAULT_BASE_DELAY_MS = 1_000;

export const directCall: ServiceCall = (_operation, fn) => fn(new AbortController().signal);

export interface ServiceCallOptions {
  timeoutMs: number;
  /** Retries after the first attempt. Only timeouts are retried. */
  maxRetries: number;
  baseDelayMs?: number;
  onRetry?: (operation: string, attempt: RetryAttempt) => void;
}

/**
 * Bound every attempt by `timeoutMs` and retry timeouts with backoff. Any other
 * failure surfaces on the first attempt.
 */
export function timedCall(options: ServiceCallOptions): ServiceCall {
  return (operation, fn) =>
    withRetry(() => withTimeout(fn, options.timeoutMs, operation), {
      maxRetries: options.maxRetries,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
      retryableErrors: ["TIMEOUT"],
      onRetry: options.onRetry ? (attempt) => options.onRetry?.(operation, attempt) : undefined,
    });
}

/** Bound a single attempt by `timeoutMs`, without retries. */
export function timeoutOnly(timeoutMs: number): ServiceCall {
  return (operation, fn) => withTimeout(fn, timeoutMs, operation);
}
