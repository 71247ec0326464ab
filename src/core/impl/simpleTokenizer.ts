import type { Term, Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

function isAlphaNum(code: number): boolean {
  return (
    (code >= 48 && code <= 57) ||
    (code >= 65 && code <= 90) ||
    (code >= 97 && code <= 122)
  );
}

/** Lower-cases A-Z only; every other character is left as is. */
function asciiLower(s: string): string {
  let out = "";
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i);
    out += String.fromCharCode(code >= 65 && code <= 90 ? code + 32 : code);
  }
  return out;
}

/**
 * Fast ASCII tokenizer:
 * - splits on anything that is not an ASCII letter or digit
 * - lowercases with ASCII rules (no Unicode case folding)
 * - yields token positions (token index) and character offsets
 */
export class SimpleTokenizer implements Tokenizer {
  *tokenize(text: string): Iterable<Token> {
    const n = text.length;
    let i = 0;
    let position = 0;

    while (i < n) {
      // skip separators
      while (i < n && !isAlphaNum(text.charCodeAt(i))) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && isAlphaNum(text.charCodeAt(i))) i++;
      const end = i;

      yield { term: asciiLower(text.slice(start, end)), position, startOffset: start, endOffset: end };
      position++;
    }
  }

  normalize(word: string): Term {
    return asciiLower(word);
  }
}
