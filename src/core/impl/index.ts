export { SimpleTokenizer } from "./simpleTokenizer.js";
export { MemoryRecordStore } from "./memoryRecordStore.js";
export { DateTree } from "./dateTree.js";
export { MemorySenderIndex } from "./memorySenderIndex.js";
export { MemoryTermIndex } from "./memoryTermIndex.js";
export { IndexingEngine, type EngineDeps } from "./indexingEngine.js";
export { createInMemoryEngine } from "./createEngine.js";
