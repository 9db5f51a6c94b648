import type { Batch } from '../types/aggregation.js';

export const DEFAULT_BATCH_SIZE = 18;
export const DEFAULT_MAX_CONCURRENT = 6;

/**
 * Split pages 1..totalPages into sequential batches.
 *
 * Algorithm:
 * - Batches hold up to `batchSize` consecutive pages
 * - Each batch gets min(maxConcurrent, batch length) workers
 * - A batch is cut into chunks of up to `maxConcurrent` pages; a chunk's pages run together
 *
 * @returns Batches in dispatch order; empty when totalPages is 0
 */
export function planBatches(
  totalPages: number,
  batchSize: number = DEFAULT_BATCH_SIZE,
  maxConcurrent: number = DEFAULT_MAX_CONCURRENT
): Batch[] {
  assertPositiveInteger('batchSize', batchSize);
  assertPositiveInteger('maxConcurrent', maxConcurrent);
  if (!Number.isInteger(totalPages) || totalPages < 0) {
    throw new RangeError(`totalPages must be a non-negative integer, got ${totalPages}`);
  }

  const batches: Batch[] = [];
  for (let batchStart = 1; batchStart <= totalPages; batchStart += batchSize) {
    const batchEnd = Math.min(batchStart + batchSize - 1, totalPages);
    const pages = range(batchStart, batchEnd);

    const chunks: number[][] = [];
    for (let i = 0; i < pages.length; i += maxConcurrent) {
      chunks.push(pages.slice(i, i + maxConcurrent));
    }

    batches.push({
      number: batches.length + 1,
      pages,
      chunks,
      workerCount: Math.min(maxConcurrent, pages.length)
    });
  }

  return batches;
}

/**
 * Round-robin slot of a page within its chunk
 */
export function workerSlot(slotInChunk: number, workerCount: number): number {
  return slotInChunk % workerCount;
}

function range(start: number, end: number): number[] {
  return Array.from({ length: end - start + 1 }, (_, i) => start + i);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}
