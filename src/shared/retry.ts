import { Logger } from './logger';

const logger = new Logger('Retry');

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  /** Return false to give up immediately on errors that will not go away. */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Runs `fn` up to `maxRetries` times with exponential backoff between attempts.
 * The last error is rethrown once every attempt has failed.
 */
export async function fetchWithRetry<T>(
  fn: () => Promise<T>,
  { maxRetries = 3, baseDelayMs = 1000, shouldRetry = () => true }: RetryOptions = {},
): Promise<T> {
  let lastError: unknown = new Error('All retry attempts failed');

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) break;
      if (attempt < maxRetries - 1) {
        const delay = baseDelayMs * Math.pow(2, attempt);
        logger.warn(`Attempt ${attempt + 1}/${maxRetries} failed, retrying in ${delay}ms`, error);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
