import type { Term, Token } from "./types.js";

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - should be deterministic for a given input
 * - tokens are already normalized (lower-cased)
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<Token>;

  /** Applies the token normalization to a single query word without splitting it. */
  normalize(word: string): Term;
}
