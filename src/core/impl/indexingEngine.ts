import createDebug from "debug";

import { InternalInvariantError } from "../errors.js";
import type { EngineStats, MessageInput, MessageRecord, RecordId, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { RecordStore } from "../recordStore.js";
import type { OrderedIndex } from "../orderedIndex.js";
import type { SenderIndex } from "../senderIndex.js";
import type { TermIndex } from "../termIndex.js";

const debug = createDebug("mail-index:engine");

export interface EngineDeps {
  tokenizer: Tokenizer;
  store: RecordStore;
  dates: OrderedIndex;
  senders: SenderIndex;
  terms: TermIndex;
}

/**
 * Composition root of the core: owns the record store and the three indexes.
 *
 * Everything here is synchronous, so on the event loop one `ingest` always finishes
 * before the next call of any kind starts.
 */
export class IndexingEngine {
  private failure: InternalInvariantError | undefined;

  constructor(private readonly deps: EngineDeps) {}

  ingest(input: MessageInput): MessageRecord {
    this.assertHealthy();

    // InvalidInputError propagates from here with no index touched
    const record = this.deps.store.create(input);

    try {
      this.deps.dates.insert(record.date, record.id);
      this.deps.senders.insert(record.sender, record.id);
      this.deps.terms.insert(record.id, this.termsOf(record));
    } catch (err) {
      this.failure = new InternalInvariantError(`Indexing of message ${record.id} failed after it was stored`, { cause: err });
      console.error(`[mail-index] ${this.failure.message}:`, err);
      throw this.failure;
    }

    debug("indexed #%d (%s) under %s", record.id, record.sender, record.date);
    return record;
  }

  getById(id: RecordId): MessageRecord {
    this.assertHealthy();
    return this.deps.store.get(id);
  }

  *allOrdered(): IterableIterator<MessageRecord> {
    this.assertHealthy();
    for (const id of this.deps.dates.inOrder()) {
      yield this.deps.store.get(id);
    }
  }

  bySender(sender: string): MessageRecord[] {
    this.assertHealthy();
    return this.deps.senders.lookup(sender).map((id) => this.deps.store.get(id));
  }

  byKeyword(word: string): ReadonlySet<MessageRecord> {
    this.assertHealthy();
    const out = new Set<MessageRecord>();
    for (const id of this.deps.terms.lookup(this.deps.tokenizer.normalize(word))) {
      out.add(this.deps.store.get(id));
    }
    return out;
  }

  senders(): string[] {
    this.assertHealthy();
    return this.deps.senders.senders();
  }

  stats(): EngineStats {
    return {
      messages: this.deps.store.size(),
      dates: this.deps.dates.nodeCount(),
      treeHeight: this.deps.dates.height(),
      senders: this.deps.senders.senders().length,
      terms: this.deps.terms.termCount(),
    };
  }

  private termsOf(record: MessageRecord): Term[] {
    const terms: Term[] = [];
    for (const tok of this.deps.tokenizer.tokenize(`${record.subject} ${record.body}`)) {
      terms.push(tok.term);
    }
    return terms;
  }

  private assertHealthy(): void {
    if (this.failure) throw this.failure;
  }
}
