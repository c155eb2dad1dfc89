import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Receives state transitions. Defaults to a console warning. */
  onStateChange?: (name: string, state: CircuitState) => void;
}

export type CircuitState = "open" | "halfOpen" | "close";

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

const STATE_MESSAGES: Record<CircuitState, string> = {
  open: "circuit OPENED (requests will be short-circuited)",
  halfOpen: "circuit HALF-OPEN (next request is a test)",
  close: "circuit CLOSED (back to normal)",
};

function warnStateChange(name: string, state: CircuitState): void {
  console.warn(`[circuit-breaker] ${name}: ${STATE_MESSAGES[state]}`);
}

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const { onStateChange = warnStateChange, ...breakerOptions } = options ?? {};
  const mergedOptions = { ...DEFAULT_OPTIONS, ...breakerOptions, name };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => onStateChange(name, "open"));
  breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
  breaker.on("close", () => onStateChange(name, "close"));

  return breaker;
}
