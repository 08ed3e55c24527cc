/**
 * Batch Processor
 *
 * Applies a single-item operation across an ordered list, keeping the
 * results of the items that succeed. A RegistryError on one item drops
 * that item and moves on; any other error still aborts the batch.
 */

import { RegistryError, isRegistryError } from './registry-errors';

export interface DroppedItem {
  index: number;
  error: RegistryError;
}

export interface BatchOutcome<R> {
  results: R[];
  dropped: DroppedItem[];
}

/**
 * Ordered result builder: append on success, unchanged on failure.
 */
class BatchAccumulator<R> {
  private readonly results: R[] = [];
  private readonly dropped: DroppedItem[] = [];

  accept(result: R): void {
    this.results.push(result);
  }

  reject(index: number, error: RegistryError): void {
    this.dropped.push({ index, error });
  }

  finish(): BatchOutcome<R> {
    return { results: this.results, dropped: this.dropped };
  }
}

export function processBatch<T, R>(
  items: readonly T[],
  apply: (item: T, index: number) => R
): BatchOutcome<R> {
  const acc = new BatchAccumulator<R>();

  items.forEach((item, index) => {
    try {
      acc.accept(apply(item, index));
    } catch (err) {
      if (!isRegistryError(err)) throw err;
      acc.reject(index, err);
    }
  });

  return acc.finish();
}
