/** Shared core types used by module contracts. */

export type RecordId = number;
export type Term = string;
/** Lexicographically sortable date text (e.g. ISO 8601). Never parsed. */
export type DateKey = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** Character offsets into the source text. */
  startOffset: number;
  endOffset: number;
}

/** An indexed message. Frozen once created. */
export interface MessageRecord {
  readonly id: RecordId;
  readonly sender: string;
  readonly subject: string;
  readonly body: string;
  readonly date: DateKey;
}

/** Fields a caller supplies when ingesting a message. */
export type MessageInput = Omit<MessageRecord, "id">;

export interface EngineStats {
  messages: number;
  dates: number;
  treeHeight: number;
  senders: number;
  terms: number;
}
