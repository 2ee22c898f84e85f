/**
 * Retry and Circuit Breaker patterns for calls to the model provider
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 60000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Executes a function with a per-attempt timeout and exponential backoff.
 * Errors rejected by `shouldRetry` are rethrown unchanged without further attempts.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: unknown = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await withTimeout(fn(), config.timeoutMs);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error;
      const willRetry = attempt < config.maxAttempts && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: errorMessage(error),
        nextRetryInMs: willRetry ? lastDelay : undefined,
      });

      if (!shouldRetry(error)) {
        throw error;
      }

      if (!willRetry) {
        break;
      }

      await sleep(lastDelay);

      // Exponential backoff
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }

  if (config.maxAttempts === 1 && lastError instanceof Error) {
    throw lastError;
  }

  throw new Error(
    `Failed after ${config.maxAttempts} attempts. Last error: ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}

/**
 * Rejects when the promise does not settle within `timeoutMs`; the timer is always cleared
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitTransition {
  timestamp: Date;
  state: CircuitState;
  reason: string;
}

export interface CircuitStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: Date | null;
  logs: CircuitTransition[];
}

/**
 * Circuit Breaker Pattern
 * Stops calling the provider for `resetTimeout` ms after repeated failures
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: CircuitTransition[] = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private now: () => number = Date.now
  ) {}

  /**
   * Execute function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = this.now();
      if (this.lastFailureTime !== null && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${this.resetTimeout - (now - (this.lastFailureTime ?? now))}ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          // Two successes in half-open close the circuit
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string): void {
    this.logs.push({
      timestamp: new Date(this.now()),
      state: newState,
      reason,
    });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
      logs: this.logs.slice(),
    };
  }
}

/**
 * Structured error record for provider failures
 */
export function createErrorLog(
  timestamp: Date,
  attempt: number,
  modelName: string,
  error: string,
  nextRetryInMs?: number
) {
  return {
    timestamp: timestamp.toISOString(),
    attempt,
    model: modelName,
    error,
    next_retry_in_ms: nextRetryInMs,
    severity: attempt >= 2 ? 'HIGH' : 'MEDIUM',
  };
}

/**
 * Transient failures worth another attempt. Auth, quota and bad-request errors are not.
 */
export function isRetryableError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'etimedout',
    'socket hang up',
    'fetch failed',
    'getaddrinfo enotfound',
    'service unavailable',
    'temporarily unavailable',
    'model is overloaded',
    '"code":503',
    '"code":500',
  ];

  return retryablePatterns.some((pattern) => message.includes(pattern));
}

/**
 * JSON-friendly view of the breaker for health reports
 */
export function summarizeCircuit(stats: CircuitStats, recent: number = 5) {
  return {
    state: stats.state,
    failureCount: stats.failureCount,
    lastFailureTime: stats.lastFailureTime ? stats.lastFailureTime.toISOString() : null,
    recentTransitions: stats.logs.slice(-recent).map((log) => ({
      timestamp: log.timestamp.toISOString(),
      state: log.state,
      reason: log.reason,
    })),
  };
}
