import { nanoid } from "nanoid";

/**
 * Create a unique ID for general use
 * This wrapper allows for easy mocking in tests
 */
export function createId(size = 12): string {
  return nanoid(size);
}

/**
 * Create a prefixed unique ID, e.g. "art_V1StGXR8_Z5j"
 */
export function createPrefixedId(prefix: string): string {
  return `${prefix}_${nanoid(12)}`;
}

/**
 * Create a batch ID with timestamp for easier debugging and sorting
 */
export function createBatchId(now: number = Date.now()): string {
  return `batch_${now}_${nanoid(8)}`;
}
