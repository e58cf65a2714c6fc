/**
 * Retry policy with exponential backoff and jitter
 */

import { HttpRequestError } from './errors';

export interface RetryConfig {
  /** Total attempts, including the first call */
  maxAttempts?: number;
  /** Delay before the first retry, in milliseconds */
  initialDelay?: number;
  /** Maximum delay in milliseconds */
  maxDelay?: number;
  /** Backoff factor (2 = double delay each time) */
  factor?: number;
  /** Add random jitter to delays (0-1, 0 = no jitter, 1 = up to 100% jitter) */
  jitter?: number;
  /** Function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback for retry attempts */
  onRetry?: (attempt: number, error: unknown, nextDelay: number) => void;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);
const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNABORTED', 'EAI_AGAIN']);
const RATE_LIMIT_REASONS = ['ratelimitexceeded', 'userratelimitexceeded', 'rate limit'];

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Rate-limit and transient server responses, plus dropped connections
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpRequestError) {
    if (TRANSIENT_STATUSES.has(error.status)) {
      return true;
    }
    // Google APIs signal per-user rate limits as 403 with a reason in the body
    if (error.status === 403 && error.body) {
      const body = error.body.toLowerCase();
      return RATE_LIMIT_REASONS.some((reason) => body.includes(reason));
    }
    return false;
  }

  const code = readCode(error);
  return code !== undefined && NETWORK_CODES.has(code);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reusable retry policy shared by the catalog and analytics clients
 */
export class RetryPolicy {
  private readonly config: Required<RetryConfig>;

  constructor(config: RetryConfig = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 4,
      initialDelay: config.initialDelay ?? 1000,
      maxDelay: config.maxDelay ?? 60000,
      factor: config.factor ?? 2,
      jitter: config.jitter ?? 0,
      isRetryable: config.isRetryable ?? isTransientError,
      onRetry: config.onRetry ?? (() => {}),
      sleep: config.sleep ?? defaultSleep,
      random: config.random ?? Math.random
    };
  }

  /**
   * Delay before retry number `attempt` (1-based)
   */
  delayFor(attempt: number): number {
    let delay = Math.min(
      this.config.initialDelay * this.config.factor ** (attempt - 1),
      this.config.maxDelay
    );

    if (this.config.jitter > 0) {
      const jitterAmount = delay * this.config.jitter * this.config.random();
      delay = delay - jitterAmount / 2 + jitterAmount;
    }

    return Math.round(delay);
  }

  /**
   * Run `fn`, retrying retryable failures until attempts run out
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.config.maxAttempts || !this.config.isRetryable(error)) {
          throw error;
        }

        const delay = this.delayFor(attempt);
        this.config.onRetry(attempt, error, delay);
        await this.config.sleep(delay);
      }
    }
  }

  /**
   * Same policy with a different retry callback
   */
  withOnRetry(onRetry: RetryConfig['onRetry']): RetryPolicy {
    return new RetryPolicy({ ...this.config, onRetry });
  }
}

