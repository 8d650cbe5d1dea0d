import { appendJsonl, truncateFile } from './io.js';
import type { Logger } from './logger.js';
import { silentLogger, plural } from './logger.js';

export function chunked<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export interface BatchCallResult<R> {
  parsed: R;
  raw: unknown;
}

export interface RunBatchesOptions<T, R> {
  items: readonly T[];
  batchSize: number;
  call: (batch: T[], index: number) => Promise<BatchCallResult<R>>;
  onResult: (parsed: R, batch: T[], index: number) => void;
  /** Truncated at start; one raw response body per line. */
  rawLogPath: string;
  logger?: Logger;
}

/**
 * Send `items` to the model one batch at a time. The first batch that fails
 * (after the caller's retries) aborts the run.
 */
export async function runBatches<T, R>(options: RunBatchesOptions<T, R>): Promise<{ batches: number }> {
  const logger = options.logger ?? silentLogger;
  const batches = chunked(options.items, options.batchSize);

  truncateFile(options.rawLogPath);
  logger.info(`Processing ${plural(options.items.length, 'item')} in ${plural(batches.length, 'batch', 'es')}`);

  for (const [index, batch] of batches.entries()) {
    logger.info(`Batch ${index + 1}/${batches.length}: ${plural(batch.length, 'item')}`);
    const { parsed, raw } = await options.call(batch, index);
    appendJsonl(options.rawLogPath, raw);
    options.onResult(parsed, batch, index);
  }

  return { batches: batches.length };
}
