import { MAX_BATCH_SIZE, MAX_DETAILS_LENGTH, MIN_DETAILS_LENGTH } from './registry-types';
import { RegistryError, RegistryErrorCode } from './registry-errors';

/**
 * Length in characters (code points), so astral symbols count once.
 */
export function detailsLength(details: string): number {
  return Array.from(details).length;
}

export function isValidDetails(details: unknown): details is string {
  if (typeof details !== 'string') return false;
  const length = detailsLength(details);
  return length >= MIN_DETAILS_LENGTH && length <= MAX_DETAILS_LENGTH;
}

export function assertValidDetails(details: unknown): asserts details is string {
  if (!isValidDetails(details)) {
    throw new RegistryError(RegistryErrorCode.InvalidDetails);
  }
}

export function assertBatchSize(size: number): void {
  if (size < 1 || size > MAX_BATCH_SIZE) {
    throw new RegistryError(
      RegistryErrorCode.MaxBatchSize,
      `Batch size must be between 1 and ${MAX_BATCH_SIZE}, got ${size}`
    );
  }
}

/**
 * Clamp a requested listing size to [0, MAX_BATCH_SIZE].
 */
export function effectiveCount(count: number): number {
  if (!Number.isFinite(count)) return 0;
  return Math.max(0, Math.min(Math.floor(count), MAX_BATCH_SIZE));
}
