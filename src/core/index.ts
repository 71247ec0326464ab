export * from "./types.js";
export * from "./errors.js";
export type { Tokenizer } from "./tokenizer.js";
export type { RecordStore } from "./recordStore.js";
export type { OrderedIndex } from "./orderedIndex.js";
export type { SenderIndex } from "./senderIndex.js";
export type { TermIndex } from "./termIndex.js";
export * from "./impl/index.js";
