import { IndexingEngine, type EngineDeps } from "./indexingEngine.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";
import { MemoryRecordStore } from "./memoryRecordStore.js";
import { DateTree } from "./dateTree.js";
import { MemorySenderIndex } from "./memorySenderIndex.js";
import { MemoryTermIndex } from "./memoryTermIndex.js";

/** Wires the default in-memory components; any of them can be overridden. */
export function createInMemoryEngine(overrides: Partial<EngineDeps> = {}): IndexingEngine {
  return new IndexingEngine({
    tokenizer: overrides.tokenizer ?? new SimpleTokenizer(),
    store: overrides.store ?? new MemoryRecordStore(),
    dates: overrides.dates ?? new DateTree(),
    senders: overrides.senders ?? new MemorySenderIndex(),
    terms: overrides.terms ?? new MemoryTermIndex(),
  });
}
