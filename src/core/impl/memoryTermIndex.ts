import type { RecordId, Term } from "../types.js";
import type { TermIndex } from "../termIndex.js";

const EMPTY: ReadonlySet<RecordId> = new Set();

/**
 * In-memory sparse term index.
 *
 * Data structure:
 * - term -> Set<recordId>
 *
 * Records are ingested in id order, so each set iterates in ascending id order.
 */
export class MemoryTermIndex implements TermIndex {
  private readonly termToIds = new Map<Term, Set<RecordId>>();

  insert(id: RecordId, terms: Iterable<Term>): void {
    for (const term of new Set(terms)) {
      let ids = this.termToIds.get(term);
      if (!ids) {
        ids = new Set();
        this.termToIds.set(term, ids);
      }
      ids.add(id);
    }
  }

  lookup(term: Term): ReadonlySet<RecordId> {
    const ids = this.termToIds.get(term);
    return ids ? new Set(ids) : EMPTY;
  }

  hasTerm(term: Term): boolean {
    const ids = this.termToIds.get(term);
    return !!ids && ids.size > 0;
  }

  termCount(): number {
    return this.termToIds.size;
  }
}
