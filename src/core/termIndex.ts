import type { RecordId, Term } from "./types.js";

/**
 * Sparse term -> record membership index.
 *
 * Contract notes:
 * - membership only (no frequencies or positions)
 * - a record is added to a term at most once
 */
export interface TermIndex {
  insert(id: RecordId, terms: Iterable<Term>): void;
  /** Exact match on an already-normalized term. Empty when unknown. */
  lookup(term: Term): ReadonlySet<RecordId>;
  hasTerm(term: Term): boolean;
  termCount(): number;
}
