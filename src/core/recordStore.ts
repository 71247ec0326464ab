import type { MessageInput, MessageRecord, RecordId } from "./types.js";

/**
 * Primary-key store and single owner of every record.
 *
 * Contract notes:
 * - identifiers start at 1 and are never reused
 * - a rejected `create` must not consume an identifier
 */
export interface RecordStore {
  /** Throws InvalidInputError when `sender` is empty. */
  create(input: MessageInput): MessageRecord;
  /** Throws RecordNotFoundError on a miss. */
  get(id: RecordId): MessageRecord;
  has(id: RecordId): boolean;
  size(): number;
  /** Records in identifier order. */
  values(): IterableIterator<MessageRecord>;
}
