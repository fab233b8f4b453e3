import type { Section, SectionId } from '../types/book.types';
import type { PRNG } from './prng.service';

/**
 * Ordered, double-ended sequence of rendered sections.
 *
 * Grows at either end and never shrinks or reorders. Renderers read it; only
 * the assembly loop inserts.
 */
export class SectionRegistry {
  private readonly entries: Section[] = [];
  private words = 0;

  get size(): number {
    return this.entries.length;
  }

  pushFront(section: Section): void {
    this.entries.unshift(section);
    this.words += section.content.wordCount();
  }

  pushBack(section: Section): void {
    this.entries.push(section);
    this.words += section.content.wordCount();
  }

  /** Current sections in book order. */
  sections(): readonly Section[] {
    return this.entries;
  }

  totalWordCount(): number {
    return this.words;
  }

  /**
   * Id of a uniformly chosen section that already exists.
   *
   * @throws {Error} If the registry is empty
   */
  randomSectionId(prng: PRNG): SectionId {
    return prng.choice(this.entries).id;
  }

  /** The book: every section's content, separated by a blank line. */
  render(): string {
    return this.entries.map(section => section.content.content).join('\n\n');
  }
}
