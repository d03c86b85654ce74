import assert from 'node:assert';
import { chunk } from 'remeda';
import { sanitizeError } from './normalize-error';

export interface BatchLogger {
  debug(message: string): void;
  error(message: object): void;
}

export interface BatchProcessorOptions<TInput, TOutput> {
  items: TInput[];
  batchSize: number;
  processor: (batch: TInput[], batchIndex: number) => Promise<TOutput[]>;
  logger: BatchLogger;
  logPrefix?: string;
  signal?: AbortSignal;
}

/**
 * Splits `items` into batches of at most `batchSize` and runs `processor` on them one after
 * another. Results are concatenated in input order. The first failing batch stops the run
 * and its error is rethrown after being logged. An aborted `signal` stops the run before the
 * next batch with the abort reason.
 */
export async function processInBatches<TInput, TOutput>({
  items,
  batchSize,
  processor,
  logger,
  logPrefix = '',
  signal,
}: BatchProcessorOptions<TInput, TOutput>): Promise<TOutput[]> {
  assert(Number.isInteger(batchSize) && batchSize > 0, 'batchSize must be a positive integer');

  const batches = chunk(items, batchSize);
  const results: TOutput[] = [];

  if (batches.length > 1) {
    logger.debug(`${logPrefix} Processing ${items.length} items in ${batches.length} batches`);
  }

  for (const [index, batch] of batches.entries()) {
    signal?.throwIfAborted();
    try {
      results.push(...(await processor(batch, index)));
    } catch (error) {
      logger.error({
        msg: `${logPrefix} Failed to process batch ${index + 1}/${batches.length}`,
        batchIndex: index,
        batchSize: batch.length,
        error: sanitizeError(error),
      });
      throw error;
    }
  }

  return results;
}
