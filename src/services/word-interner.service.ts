/**
 * Word Interner - process-wide table of unique lowercase words.
 *
 * Words live in an append-only arena; a `Word` is the index of its spelling.
 * A side map from spelling to handle deduplicates. Nothing is ever removed.
 */

import type { Word } from '../types/book.types';
import { InvalidWordError } from '../utils/error-handler';
import type { PRNG } from './prng.service';

/** Lowercase letters with optional internal apostrophes ("you're"). */
const LOWERCASE_WORD = /^[a-z]+(?:'[a-z]+)*$/;

export class WordInterner {
  private readonly arena: string[] = [];
  private readonly handles = new Map<string, Word>();

  constructor(private readonly prng: PRNG) {}

  /** Number of distinct words interned so far. */
  get size(): number {
    return this.arena.length;
  }

  /**
   * Returns the handle for a spelling, allocating one on first sight.
   *
   * @throws {InvalidWordError} If the text is not a lowercase word; the
   *   tokenizer never produces one, so this is a caller bug.
   */
  intern(text: string): Word {
    const existing = this.handles.get(text);
    if (existing !== undefined) {
      return existing;
    }
    if (!LOWERCASE_WORD.test(text)) {
      throw new InvalidWordError(text);
    }

    const word = this.arena.length;
    this.arena.push(text);
    this.handles.set(text, word);
    return word;
  }

  resolve(word: Word): string {
    const text = this.arena[word];
    if (text === undefined) {
      throw new RangeError(`unknown word handle ${word}`);
    }
    return text;
  }

  /**
   * A uniformly random word among everything interned so far.
   *
   * @throws {Error} If nothing has been interned yet
   */
  pickRandom(): string {
    if (this.arena.length === 0) {
      throw new Error('Cannot pick a random word before any word is interned');
    }
    return this.arena[this.prng.nextInt(0, this.arena.length)];
  }
}
