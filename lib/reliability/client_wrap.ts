/**
 * Retry + Circuit Breaker Utility
 *
 * Jittered exponential backoff and a circuit breaker for wrapping the
 * inference engine's network calls. Both stop as soon as the caller aborts.
 */

import { log, logWarn } from '../../server/logger';

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  retryOn: (error: unknown) => boolean;
  signal?: AbortSignal;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  successThreshold: number;
  openDurationMs: number;
  name: string;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
  totalRequests: number;
  totalFailures: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
  retryOn: isRetryableError,
};

const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  openDurationMs: 30000,
  name: 'default',
};

function statusOf(error: Error): number | undefined {
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' ? status : undefined;
}

export function is429Error(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return statusOf(error) === 429 || error.message.toLowerCase().includes('rate limit');
}

export function is5xxError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const status = statusOf(error);
  return status !== undefined && status >= 500 && status < 600;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (isAbortError(error)) return false;
  if (is429Error(error) || is5xxError(error)) return true;

  const message = error.message.toLowerCase();
  return ['timeout', 'econnreset', 'socket hang up', 'network'].some((fragment) => message.includes(fragment));
}

function calculateBackoff(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private lastFailureTime: number | null = null;
  private lastStateChange: number = Date.now();
  private totalRequests = 0;
  private totalFailures = 0;
  private pendingTrial = false;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get name(): string {
    return this.config.name;
  }

  get stats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      lastFailureTime: this.lastFailureTime,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
    };
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;
    log(`${this.state} -> ${newState}`, `CircuitBreaker:${this.config.name}`);
    this.state = newState;
    this.lastStateChange = Date.now();
    this.pendingTrial = false;
    if (newState !== CircuitState.OPEN) {
      this.successes = 0;
    }
    if (newState === CircuitState.CLOSED) {
      this.failures = 0;
    }
  }

  canExecute(): boolean {
    if (this.state === CircuitState.CLOSED) return true;

    if (this.state === CircuitState.OPEN) {
      if (Date.now() - this.lastStateChange < this.config.openDurationMs) return false;
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    // Half-open lets exactly one trial call through at a time
    if (this.pendingTrial) return false;
    this.pendingTrial = true;
    return true;
  }

  recordSuccess(): void {
    this.totalRequests++;
    this.pendingTrial = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    } else {
      this.failures = 0;
    }
  }

  recordFailure(): void {
    this.totalRequests++;
    this.totalFailures++;
    this.failures++;
    this.lastFailureTime = Date.now();
    this.pendingTrial = false;

    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.config.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  // Frees the half-open trial slot without counting a failure
  releaseTrial(): void {
    this.pendingTrial = false;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = null;
    this.lastStateChange = Date.now();
    this.pendingTrial = false;
  }
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly stats: CircuitBreakerStats
  ) {
    super(`Circuit breaker '${circuitName}' is open. Too many recent failures.`);
    this.name = 'CircuitOpenError';
  }
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const opts: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (opts.signal?.aborted || attempt === opts.maxRetries || !opts.retryOn(error)) {
        throw error;
      }

      const delayMs = calculateBackoff(attempt, opts);
      logWarn(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms...`, 'withRetry');
      await sleep(delayMs, opts.signal);
    }
  }

  throw lastError;
}

export async function withCircuitBreaker<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  signal?: AbortSignal
): Promise<T> {
  if (!breaker.canExecute()) {
    throw new CircuitOpenError(breaker.name, breaker.stats);
  }

  try {
    const result = await fn();
    breaker.recordSuccess();
    return result;
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      breaker.releaseTrial();
    } else {
      breaker.recordFailure();
    }
    throw error;
  }
}

export async function withReliability<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  retryConfig: Partial<RetryConfig> = {}
): Promise<T> {
  return withCircuitBreaker(() => withRetry(fn, retryConfig), breaker, retryConfig.signal);
}

export function createInferenceBreaker(name = 'inference'): CircuitBreaker {
  return new CircuitBreaker({
    name,
    failureThreshold: 5,
    successThreshold: 2,
    openDurationMs: 30000,
  });
}

export async function wrapInference<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  signal?: AbortSignal
): Promise<T> {
  return withReliability(fn, breaker, {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    retryOn: isRetryableError,
    signal,
  });
}
