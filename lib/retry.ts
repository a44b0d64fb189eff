import { errorMessage, isTransient } from './errors';
import { log } from './logger';

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the computed delay added as random jitter (0 disables) */
  jitter?: number;
  /** Decides whether a failure may be retried. Defaults to transient errors */
  retryOn?: (error: unknown) => boolean;
  /** Overrides the computed delay for a given failure (e.g. Retry-After) */
  delayFor?: (error: unknown, attempt: number) => number | null;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Logger scope used for retry messages */
  scope?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Bounded exponential backoff with jitter.
 *
 * One instance is shared per concern (store, session, extraction, HTTP) so the
 * retry loop lives in a single place.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly retryOn: (error: unknown) => boolean;
  private readonly delayFor?: (error: unknown, attempt: number) => number | null;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly scope: string;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 3));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 500);
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs ?? 10000);
    this.jitter = Math.max(0, options.jitter ?? 0.5);
    this.retryOn = options.retryOn ?? isTransient;
    this.delayFor = options.delayFor;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.scope = options.scope ?? 'retry';
  }

  /** Delay before retry number `attempt` (0-based), jitter included, never above maxDelayMs */
  delay(attempt: number): number {
    const exponential = Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);
    return Math.min(Math.floor(exponential + this.random() * exponential * this.jitter), this.maxDelayMs);
  }

  async run<T>(operation: (attempt: number) => Promise<T>, context = 'operation'): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;

        if (attempt === this.maxAttempts - 1 || !this.retryOn(error)) {
          throw error;
        }

        const override = this.delayFor?.(error, attempt);
        const wait = override ?? this.delay(attempt);
        log.debug(this.scope, `Retry ${attempt + 1}/${this.maxAttempts - 1} in ${wait}ms for ${context}`, {
          error: errorMessage(error),
        });
        await this.sleepFn(wait);
      }
    }

    throw lastError;
  }

  with(overrides: RetryPolicyOptions): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      jitter: this.jitter,
      retryOn: this.retryOn,
      delayFor: this.delayFor,
      sleep: this.sleepFn,
      random: this.random,
      scope: this.scope,
      ...overrides,
    });
  }
}
