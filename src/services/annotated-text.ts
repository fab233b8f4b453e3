import type { Word } from '../types/book.types';
import type { WordInterner } from './word-interner.service';

/**
 * One or more letters, optionally followed by apostrophe-letter groups, so
 * "it's" and "NaNoGenMo" are single tokens. Digits, punctuation and
 * whitespace only ever separate tokens.
 */
const TOKEN_PATTERN = /[A-Za-z]+(?:'[A-Za-z]+)*/g;

/**
 * Immutable text paired with the words it contains, in source order and with
 * duplicates kept.
 */
export class AnnotatedText {
  private constructor(
    readonly content: string,
    readonly words: readonly Word[]
  ) {}

  /**
   * Finds all the words in `content`, lowercases and interns them.
   */
  static annotate(interner: WordInterner, content: string): AnnotatedText {
    const words: Word[] = [];
    for (const match of content.matchAll(TOKEN_PATTERN)) {
      words.push(interner.intern(match[0].toLowerCase()));
    }
    return new AnnotatedText(content, Object.freeze(words));
  }

  /** Number of word occurrences (not distinct words). */
  wordCount(): number {
    return this.words.length;
  }

  toString(): string {
    return this.content;
  }
}
