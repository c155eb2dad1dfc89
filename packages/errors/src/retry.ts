import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Attempts after the first one. Default: 3 */
  maxRetries?: number;
  /** Backoff before the first retry, doubled for each later one. Default: 1000 */
  baseDelayMs?: number;
  /** Upper bound on a single backoff. Default: 10000 */
  maxDelayMs?: number;
  /**
   * Error codes worth another attempt. Service calls pass `["TIMEOUT"]`, so a
   * slow download or embedding request is retried and every other failure is
   * final.
   */
  retryableErrors?: string[];
  /** Called before each backoff sleep. Defaults to a console warning. */
  onRetry?: (info: RetryAttempt) => void;
}

export interface RetryAttempt {
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

const DEFAULTS = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
} satisfies RetryOptions;

function codeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Errors a caller caused (bad arguments, an empty corpus) are never retried.
 * With a code list only listed codes are retried; without one, any other
 * failure is.
 */
function shouldRetry(error: unknown, codes: readonly string[] | undefined): boolean {
  if (AppError.isAppError(error) && error.statusCode < 500) return false;
  if (codes && codes.length > 0) {
    const code = codeOf(error);
    return code !== undefined && codes.includes(code);
  }
  return true;
}

/** `min(maxDelay, baseDelay * 2^retryIndex)`, scaled by a random 50-100%. */
function backoff(retryIndex: number, baseDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** retryIndex);
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

function warnRetry({ attempt, maxRetries, delayMs }: RetryAttempt): void {
  console.warn(
    `[retry] Attempt ${String(attempt)}/${String(maxRetries)} failed, retrying in ${String(delayMs)}ms...`,
  );
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn` until it succeeds, fails with an error that is not worth retrying,
 * or has failed `maxRetries + 1` times. The last error is rethrown as is.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const onRetry = options.onRetry ?? warnRetry;

  for (let retryIndex = 0; ; retryIndex++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (retryIndex >= maxRetries || !shouldRetry(error, options.retryableErrors)) {
        throw error;
      }
      const delayMs = backoff(retryIndex, baseDelayMs, maxDelayMs);
      onRetry({ attempt: retryIndex + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }
}
