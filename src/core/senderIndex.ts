import type { RecordId } from "./types.js";

/**
 * Sender -> identifiers, append-only, in insertion order.
 * Sender strings are opaque: matching is exact and case-sensitive.
 */
export interface SenderIndex {
  insert(sender: string, id: RecordId): void;
  /** Empty when the sender is unknown. */
  lookup(sender: string): RecordId[];
  /** Known senders in first-seen order. */
  senders(): string[];
}
