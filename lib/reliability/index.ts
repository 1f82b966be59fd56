/**
 * Reliability Utilities
 *
 * Backoff, retry, circuit breaker and clock primitives shared by the stream
 * readers, the station directory and the transcription stage.
 */

export {
  CircuitState,
  CircuitBreaker,
  CircuitOpenError,
  type Clock,
  type BackoffStrategy,
  type RetryConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  systemClock,
  fixedBackoff,
  exponentialBackoff,
  calculateBackoff,
  settleWithin,
  withRetry,
  withCircuitBreaker,
  withReliability,
  getCircuitBreaker,
  resetAllCircuitBreakers,
  transcriptionBreaker,
  directoryBreaker,
  getStatusCode,
  isRetryableError,
} from './client_wrap';
