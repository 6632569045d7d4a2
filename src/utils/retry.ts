import { ValidationError } from './errors';
import { logger, errorMessage } from './logger';

export interface RetryPolicy {
  maxAttempts: number;
  /** Wait before attempt n+1 is backoffMs[n-1]; the last entry repeats. */
  backoffMs: readonly number[];
  isRetryable: (error: unknown) => boolean;
  label?: string;
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);
const RETRYABLE_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'UND_ERR_CONNECT_TIMEOUT']);
const RETRYABLE_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'TimeoutError', 'AbortError']);

function readField(error: unknown, field: string): unknown {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  return Reflect.get(error, field);
}

/**
 * Timeouts, rate limits, connection drops and 5xx responses are transient;
 * bad requests and auth failures are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ValidationError) return false;

  const status = readField(error, 'status');
  if (typeof status === 'number') {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }

  const code = readField(error, 'code');
  if (typeof code === 'string' && RETRYABLE_CODES.has(code)) return true;

  return error instanceof Error && RETRYABLE_NAMES.has(error.name);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(operation: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const { maxAttempts, backoffMs, isRetryable, label = 'operation' } = policy;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      lastError = error;

      if (attempt === maxAttempts || !isRetryable(error)) {
        throw error;
      }

      const delay = backoffMs.length > 0 ? backoffMs[Math.min(attempt - 1, backoffMs.length - 1)] : 0;
      logger.warn('Transient failure, backing off', { label, attempt, delay, error: errorMessage(error) });
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
