/**
 * Retry logic with exponential backoff for the provider client
 *
 * Features:
 * - Exponential backoff with configurable base delay
 * - Jitter to prevent thundering herd
 * - Rate limit handling (HTTP 429, Retry-After)
 */

import { ApiError } from '../errors.js';
import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/**
 * HTTP status of a rate-limited request
 */
export const RATE_LIMIT_STATUS = 429;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
}

/**
 * Error for a failed provider request, with HTTP status
 *
 * `status` is the HTTP status; a provider-level failure reported inside a
 * 200 response keeps status 200 and carries the provider's error type in
 * `code`.
 */
export class ApiRequestError extends ApiError {
  public readonly status: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: unknown;
    }
  ) {
    super(message, { code: options?.code, cause: options?.cause });
    this.name = 'ApiRequestError';
    this.status = status;
    this.details = options?.details;
    this.retryAfter = options?.retryAfter;
  }

  /**
   * Check if this error is a rate limit error
   */
  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param retryAfter - Optional Retry-After header value (seconds)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  // If rate-limited with Retry-After header, use that (converted to ms)
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  const delayWithJitter = exponentialDelay + jitter;

  // Clamp to max delay
  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(
  error: Error,
  config: Required<RetryConfig>
): boolean {
  // Network errors are retryable
  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return true;
  }

  // Timeouts
  if (error.name === 'AbortError') {
    return true;
  }

  if (error instanceof ApiRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  const networkErrorPatterns = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'socket hang up',
  ];

  const message = error.message.toLowerCase();
  return networkErrorPatterns.some((pattern) =>
    message.includes(pattern.toLowerCase())
  );
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  if (/^\d+$/.test(value.trim())) {
    const seconds = parseInt(value, 10);
    return seconds > 0 ? seconds : undefined;
  }

  const delayMs = new Date(value).getTime() - Date.now();
  if (!isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @param fn - The function to execute
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };

  const log = options.logger ?? logger;
  const startTime = Date.now();
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const data = await fn();
      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }
      return { success: true, data, attempts: attempt, totalTimeMs };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      const isRetryable = options.isRetryable
        ? options.isRetryable(error)
        : isRetryableError(error, config);
      const isLastAttempt = attempt > config.maxRetries;

      if (!isRetryable || isLastAttempt) {
        if (isLastAttempt && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: error.message,
            attempts: attempt,
          });
        } else if (!isRetryable) {
          log.debug('Error is not retryable', {
            error: error.message,
            attempts: attempt,
          });
        }

        return {
          success: false,
          error,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }

      const retryAfter = error instanceof ApiRequestError ? error.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(
        `Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`,
        {
          error: error.message,
          status: error instanceof ApiRequestError ? error.status : undefined,
          delayMs: Math.round(delayMs),
        }
      );

      options.onRetry?.(attempt, error, delayMs);

      await sleep(delayMs);
    }
  }
}
