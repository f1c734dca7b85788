import type { Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

const WORD_CHAR = /[\p{L}\p{M}\p{N}]/u;

/**
 * Unicode-aware word splitter plus character n-grams:
 * - splits on anything that is not a letter, combining mark or digit
 * - lowercases
 * - grams are `gramSize` code points wide; shorter words are their own gram
 */
export class NGramTokenizer implements Tokenizer {
  constructor(private readonly gramSize: number = 3) {
    if (!Number.isInteger(gramSize) || gramSize < 1) {
      throw new RangeError(`gramSize must be a positive integer, got ${gramSize}`);
    }
  }

  words(text: string): Term[] {
    const out: Term[] = [];
    let current = "";

    for (const ch of text) {
      if (WORD_CHAR.test(ch)) {
        current += ch;
        continue;
      }
      if (current) out.push(current.toLowerCase());
      current = "";
    }
    if (current) out.push(current.toLowerCase());

    return out;
  }

  grams(text: string): Term[] {
    const out: Term[] = [];
    const n = this.gramSize;

    for (const word of this.words(text)) {
      const chars = Array.from(word);
      if (chars.length <= n) {
        out.push(word);
        continue;
      }
      for (let i = 0; i + n <= chars.length; i++) {
        out.push(chars.slice(i, i + n).join(""));
      }
    }

    return out;
  }
}
