/**
 * Retry, Backoff + Circuit Breaker Utility
 *
 * Backoff strategies for stream reconnects, jittered retries for directory
 * lookups, and a circuit breaker around the transcription engine.
 * Time is read through an injectable Clock so callers can be tested
 * without waiting on real timers.
 */

import { log } from '../../server/logger';

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/** Delay before the retry that follows the `failureIndex`-th consecutive failure (0-based). */
export type BackoffStrategy = (failureIndex: number) => number;

export function fixedBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs;
}

export function exponentialBackoff(options: {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor?: number;
  random?: () => number;
}): BackoffStrategy {
  const { baseDelayMs, maxDelayMs, jitterFactor = 0, random = Math.random } = options;
  return (failureIndex) => calculateBackoff(failureIndex, baseDelayMs, maxDelayMs, jitterFactor, random);
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  retryOn: (error: unknown) => boolean;
  clock: Clock;
  label: string;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  successThreshold: number;
  openDurationMs: number;
  name: string;
  clock: Clock;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  lastStateChange: number;
  totalRequests: number;
  totalFailures: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
  retryOn: isRetryableError,
  clock: systemClock,
  label: 'withRetry',
};

const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  openDurationMs: 30000,
  name: 'default',
  clock: systemClock,
};

export function getStatusCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return null;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const status = getStatusCode(error);

    if (status === 429) return true;
    if (status !== null && status >= 500 && status < 600) return true;

    if (message.includes('rate limit')) return true;
    if (message.includes('timeout')) return true;
    if (message.includes('timed out')) return true;
    if (message.includes('econnreset')) return true;
    if (message.includes('socket hang up')) return true;
    if (message.includes('network')) return true;
    if (message.includes('fetch failed')) return true;
  }

  return false;
}

export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  const jitter = cappedDelay * jitterFactor * (random() * 2 - 1);

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Resolves true once `promise` settles (either way), or false when
 * `timeoutMs` passes first.
 */
export async function settleWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then(
        () => true,
        () => true
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number = 0;
  private successes: number = 0;
  private lastFailureTime: number | null = null;
  private lastStateChange: number;
  private totalRequests: number = 0;
  private totalFailures: number = 0;
  private pendingProbe: boolean = false;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
    this.lastStateChange = this.config.clock.now();
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get stats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: this.lastStateChange,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
    };
  }

  get name(): string {
    return this.config.name;
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state !== newState) {
      log(`[CircuitBreaker:${this.config.name}] ${this.state} -> ${newState}`, 'reliability');
      this.state = newState;
      this.lastStateChange = this.config.clock.now();

      if (newState === CircuitState.CLOSED) {
        this.failures = 0;
        this.successes = 0;
        this.pendingProbe = false;
      } else if (newState === CircuitState.HALF_OPEN) {
        this.successes = 0;
        this.pendingProbe = false;
      } else if (newState === CircuitState.OPEN) {
        this.pendingProbe = false;
      }
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.state !== CircuitState.OPEN) return false;

    const timeSinceOpen = this.config.clock.now() - this.lastStateChange;
    return timeSinceOpen >= this.config.openDurationMs;
  }

  canExecute(): boolean {
    if (this.state === CircuitState.CLOSED) {
      return true;
    }

    if (this.state === CircuitState.OPEN) {
      if (this.shouldAttemptReset()) {
        this.transitionTo(CircuitState.HALF_OPEN);
        this.pendingProbe = true;
        return true;
      }
      return false;
    }

    if (!this.pendingProbe) {
      this.pendingProbe = true;
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.totalRequests++;
    this.pendingProbe = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failures = 0;
    }
  }

  recordFailure(): void {
    this.totalRequests++;
    this.totalFailures++;
    this.failures++;
    this.lastFailureTime = this.config.clock.now();
    this.pendingProbe = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED) {
      if (this.failures >= this.config.failureThreshold) {
        this.transitionTo(CircuitState.OPEN);
      }
    }
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = null;
    this.lastStateChange = this.config.clock.now();
    this.pendingProbe = false;
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
  const opts = { ...DEFAULT_RETRY_CONFIG, ...config };

  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === opts.maxRetries) {
        break;
      }

      if (!opts.retryOn(error)) {
        throw error;
      }

      const delayMs = calculateBackoff(
        attempt,
        opts.baseDelayMs,
        opts.maxDelayMs,
        opts.jitterFactor
      );

      log(`[${opts.label}] Attempt ${attempt + 1} failed, retrying in ${delayMs}ms...`, 'reliability');
      await opts.clock.sleep(delayMs);
    }
  }

  throw lastError;
}

export async function withCircuitBreaker<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker
): Promise<T> {
  if (!breaker.canExecute()) {
    throw new CircuitOpenError(breaker.name, breaker.stats);
  }

  try {
    const result = await fn();
    breaker.recordSuccess();
    return result;
  } catch (error) {
    breaker.recordFailure();
    throw error;
  }
}

export async function withReliability<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  retryConfig: Partial<RetryConfig> = {}
): Promise<T> {
  return withCircuitBreaker(
    () => withRetry(fn, retryConfig),
    breaker
  );
}

const circuitBreakers = new Map<string, CircuitBreaker>();

export function getCircuitBreaker(
  name: string,
  config: Partial<CircuitBreakerConfig> = {}
): CircuitBreaker {
  let breaker = circuitBreakers.get(name);
  if (!breaker) {
    breaker = new CircuitBreaker({ ...config, name });
    circuitBreakers.set(name, breaker);
  }
  return breaker;
}

export function resetAllCircuitBreakers(): void {
  circuitBreakers.forEach(breaker => breaker.reset());
}

// Shared by every station.
export const transcriptionBreaker = getCircuitBreaker('transcription', {
  failureThreshold: 5,
  successThreshold: 1,
  openDurationMs: 30000,
});

export const directoryBreaker = getCircuitBreaker('station-directory', {
  failureThreshold: 3,
  successThreshold: 1,
  openDurationMs: 60000,
});
