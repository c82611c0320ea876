/**
 * Timeout and Circuit Breaker patterns for outbound calls.
 * Calls are never retried: a timed-out or failing call is terminal for that step.
 */

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export type Severity = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Runs `fn` and rejects if it has not settled within `timeoutMs`.
 * On timeout the signal handed to `fn` is aborted, so a request started
 * with it is cancelled rather than left running.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  label: string = 'request'
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Timeout after ${timeoutMs}ms (${label})`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Circuit Breaker Pattern
 * Stops calling a provider that keeps failing until the reset timeout passes
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: 'closed' | 'open' | 'half-open' = 'closed';
  private logs: Array<{ timestamp: Date; state: string; reason: string }> = [];

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
        const waited = now - (this.lastFailureTime ?? now);
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${this.resetTimeout - waited}ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = 0;
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

  private logStateChange(newState: string, reason: string): void {
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

  getState(): 'closed' | 'open' | 'half-open' {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  /**
   * Reset circuit breaker manually
   */
  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

export interface ErrorLog {
  timestamp: string;
  component: string;
  instance_id?: string;
  error: string;
  severity: Severity;
}

/**
 * Create structured error log in JSON format
 */
export function createErrorLog(
  component: string,
  error: unknown,
  instanceId?: string,
  severity: Severity = 'MEDIUM'
): ErrorLog {
  return {
    timestamp: new Date().toISOString(),
    component,
    instance_id: instanceId,
    error: errorMessage(error),
    severity,
  };
}

/**
 * Write a structured error record to stderr
 */
export function logError(
  component: string,
  error: unknown,
  instanceId?: string,
  severity: Severity = 'MEDIUM'
): void {
  console.error(JSON.stringify(createErrorLog(component, error, instanceId, severity)));
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
