/**
 * Retry Service
 * Bounded retry with exponential backoff and jitter for transient upstream errors
 */

export interface RetryConfig {
  /** Maximum number of retry attempts (default: 1) */
  maxRetries: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 2000) */
  maxDelayMs: number;
  /** Decides whether an error is worth another attempt */
  shouldRetry: (error: unknown) => boolean;
  /** Called before each retry with the failed attempt number */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_CONFIG: Pick<RetryConfig, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'> = {
  maxRetries: 1,
  baseDelayMs: 500,
  maxDelayMs: 2000,
};

/** HTTP status codes that should be retried */
export const RETRYABLE_STATUSES = [
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

const TRANSIENT_MESSAGES = ['network', 'timeout', 'econnreset', 'socket hang up', 'fetch failed', 'aborted'];

/**
 * Calculate backoff delay with jitter
 * @param attempt The failed attempt number (1-based)
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>
): number {
  if (config.baseDelayMs === 0) {
    return 0;
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(2, Math.max(1, attempt) - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Jitter: 0-10% of base delay
  return cappedDelay + Math.random() * config.baseDelayMs * 0.1;
}

export function isRetryableStatus(
  status: number,
  retryableStatuses: number[] = RETRYABLE_STATUSES
): boolean {
  return retryableStatuses.includes(status);
}

/**
 * Network-level failures (no HTTP status) that are usually transient
 */
export function isTransientNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

/**
 * Execute a function, retrying transient failures up to maxRetries times.
 * The last error is rethrown unchanged once attempts are exhausted.
 */
export async function retry<T>(
  fn: RetryableFunction<T>,
  config: Partial<RetryConfig> & Pick<RetryConfig, 'shouldRetry'>
): Promise<T> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = fullConfig.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn({ attempt });
    } catch (error) {
      if (attempt >= maxAttempts || !fullConfig.shouldRetry(error)) {
        throw error;
      }

      const delay = calculateBackoff(attempt, fullConfig);
      fullConfig.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
