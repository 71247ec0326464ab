import type { DateKey, RecordId } from "./types.js";

/**
 * Date-ordered index. Records sharing a date key live in one bucket.
 */
export interface OrderedIndex {
  insert(date: DateKey, id: RecordId): void;

  /**
   * Lazily yields identifiers by ascending date, insertion order within a bucket.
   * Every call starts a fresh traversal.
   */
  inOrder(): IterableIterator<RecordId>;

  /** Identifiers indexed. */
  size(): number;
  /** Distinct date keys. */
  nodeCount(): number;
  height(): number;
}
