/**
 * Retry Utilities
 * Configurable retry logic with exponential backoff for handling transient errors
 */

import { logger } from '@/config/logger.js';
import { delay } from './utils.js';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  retryableErrors?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  operation?: string;
}

export interface RetryContext {
  attempt: number;
  maxAttempts: number;
  lastError?: unknown;
}

const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 4000,
  maxDelayMs: 10000,
  jitterMs: 500,
};

interface ErrorShape {
  status?: unknown;
  statusCode?: unknown;
  code?: unknown;
  message?: unknown;
}

function asErrorShape(error: unknown): ErrorShape | null {
  if (typeof error !== 'object' || error === null) return null;
  const target: object = error;
  const read = (key: keyof ErrorShape): unknown =>
    key in target ? Reflect.get(target, key) : undefined;
  return {
    status: read('status'),
    statusCode: read('statusCode'),
    code: read('code'),
    message: read('message'),
  };
}

const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

const RETRYABLE_ERROR_CODES = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  '57P01', // admin_shutdown
  '08000', // connection_exception
  '08003', // connection_does_not_exist
  '08006', // connection_failure
  'rate_limit_exceeded',
  'server_error',
  'timeout',
];

const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /connection reset/i,
  /connection terminated/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /rate limit/i,
  /too many requests/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

/**
 * Determine if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  const err = asErrorShape(error);
  if (!err) return false;

  const status = err.status ?? err.statusCode ?? err.code;
  if (typeof status === 'number' && RETRYABLE_STATUSES.includes(status)) {
    return true;
  }

  if (typeof err.code === 'string' && RETRYABLE_ERROR_CODES.includes(err.code)) {
    return true;
  }

  const message = typeof err.message === 'string' ? err.message : '';
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

const SAFETY_ERROR_CODES = [
  'moderation_blocked',
  'content_policy_violation',
  'IMAGE_SAFETY_BLOCKED',
  'PROHIBITED_CONTENT',
  'SAFETY',
];

const SAFETY_PATTERNS = [
  /safety system/i,
  /moderation/i,
  /content policy/i,
  /prohibited content/i,
  /safety.*blocked/i,
  /prompt blocked/i,
];

/**
 * Determine if an error is a safety/moderation block
 */
export function isSafetyBlockError(error: unknown): boolean {
  const err = asErrorShape(error);
  if (!err) return false;

  const status = err.status ?? err.statusCode;
  if (status === 422) return true;

  if (typeof err.code === 'string' && SAFETY_ERROR_CODES.includes(err.code)) {
    return true;
  }

  const message = typeof err.message === 'string' ? err.message : '';
  return SAFETY_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Exponential backoff: baseDelay * 2^(attempt - 1), capped, with +/- jitter
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMs * 2 - jitterMs;
  return Math.floor(Math.max(0, cappedDelay + jitter));
}

/**
 * Execute an async function with retry logic
 *
 * @returns The result of the function or throws the last error
 */
export async function withRetry<T>(
  fn: (context: RetryContext) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const jitterMs = options.jitterMs ?? DEFAULT_RETRY_OPTIONS.jitterMs;
  const retryableErrors = options.retryableErrors ?? isTransientError;
  const sleep = options.sleep ?? delay;
  const operation = options.operation ?? 'operation';

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn({ attempt, maxAttempts, lastError });
    } catch (error) {
      lastError = error;

      const shouldRetry = retryableErrors(error);
      if (!shouldRetry || attempt >= maxAttempts) {
        logger.error('Retry: Final attempt failed or error not retryable', {
          operation,
          attempt,
          maxAttempts,
          retryable: shouldRetry,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);

      logger.warn('Retry: Attempt failed, retrying after delay', {
        operation,
        attempt,
        maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });

      if (options.onRetry) {
        await options.onRetry(attempt, error);
      }

      await sleep(delayMs);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}
