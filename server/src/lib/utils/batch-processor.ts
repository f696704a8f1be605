/**
 * Batch Processing Utility
 * Generic helpers for working through items in fixed-size batches
 */

/**
 * Result of batch processing. A failed batch is recorded by its index; the batches
 * after it still run.
 */
export interface BatchProcessingResult<R> {
  successful: R[];
  failed: Array<{ index: number; error: string }>;
}

/**
 * Split array into chunks of specified size
 */
export function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Process items batch by batch, in order
 * @param processor - Called once per batch with the batch and its index
 * @param isFatal - Errors it accepts stop the run and are rethrown instead of recorded
 */
export async function processBatch<T, R>(
  items: readonly T[],
  batchSize: number,
  processor: (batch: T[], index: number) => Promise<R>,
  isFatal: (error: unknown) => boolean = () => false
): Promise<BatchProcessingResult<R>> {
  const result: BatchProcessingResult<R> = { successful: [], failed: [] };
  const chunks = chunkArray(items, batchSize);

  for (const [index, chunk] of chunks.entries()) {
    try {
      result.successful.push(await processor(chunk, index));
    } catch (error: unknown) {
      if (isFatal(error)) {
        throw error;
      }
      result.failed.push({ index, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return result;
}
