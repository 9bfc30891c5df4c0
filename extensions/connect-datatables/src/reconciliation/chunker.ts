/**
 * Batch Chunker
 */

import { ConfigurationError } from "../errors.js";

/** Amazon Connect accepts at most 25 values per batch value call */
export const SERVICE_BATCH_CEILING = 25;

export function validateBatchSize(batchSize: number, ceiling: number = SERVICE_BATCH_CEILING): number {
  if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > ceiling) {
    throw new ConfigurationError(
      `Invalid batch size ${batchSize}: must be an integer between 1 and ${ceiling}`,
    );
  }
  return batchSize;
}

/**
 * Split items into consecutive batches of at most `batchSize`, preserving order
 */
export function* chunkRows<T>(items: Iterable<T>, batchSize: number): Generator<T[]> {
  validateBatchSize(batchSize, Number.MAX_SAFE_INTEGER);
  let batch: T[] = [];
  for (const item of items) {
    batch.push(item);
    if (batch.length === batchSize) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) yield batch;
}
