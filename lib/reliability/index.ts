/**
 * Reliability Utilities
 *
 * Retry and circuit breaker patterns for the inference engine's external calls.
 */

export {
  CircuitState,
  CircuitBreaker,
  CircuitOpenError,
  type RetryConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  withRetry,
  withCircuitBreaker,
  withReliability,
  createInferenceBreaker,
  wrapInference,
  isAbortError,
  isRetryableError,
  is429Error,
  is5xxError,
} from './client_wrap';
