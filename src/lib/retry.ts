import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { errorMessage } from './errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, counting the first. Values below 1 mean a single attempt. */
  attempts: number;
  /** Fixed wait between failed attempts. */
  waitMs: number;
  logger?: Logger;
  sleep?: Sleep;
}

/**
 * Run `fn` until it resolves or `attempts` are used up. The last error is
 * rethrown as-is; no wait follows the final failure.
 */
export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const logger = options.logger ?? silentLogger;
  const wait = options.sleep ?? sleep;

  let lastErr: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt < attempts) {
        logger.warn(`${label} attempt ${attempt}/${attempts} failed: ${errorMessage(err)}; retrying in ${options.waitMs}ms`);
        await wait(options.waitMs);
      } else {
        logger.warn(`${label} attempt ${attempt}/${attempts} failed: ${errorMessage(err)}`);
      }
    }
  }
  throw lastErr;
}
