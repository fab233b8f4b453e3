/**
 * Book Assembly Service - grows a book one section at a time.
 *
 * Starts from a single Chapter 1 and, while the book is shorter than the word
 * minimum, picks one of the seven other section kinds uniformly, renders it
 * against the sections that exist at that moment and inserts it at the front
 * (Dedication, Fourword, Table of Contents) or the back (Glossary, List of
 * Figures, Index, Afterword). Inserted sections are never regenerated, so a
 * table of contents, glossary or index describes the book as it was when it
 * was rendered.
 *
 * @example
 * ```typescript
 * const service = new BookAssemblyService({
 *   prng: new PRNG(42n),
 *   glossaryData: loadGlossaryData(),
 * });
 * const book = service.generate(50_000);
 * console.log(book.render());
 * ```
 */

import { SectionKind, type GlossaryData, type Section } from '../types/book.types';
import { InvalidWordMinimumError } from '../utils/error-handler';
import { logDebug, logLine } from '../utils/logger';
import { buildGlossary, type Glossary } from './glossary.service';
import type { PRNG } from './prng.service';
import { SectionIdAllocator } from './section-id.service';
import { SectionRegistry } from './section-registry';
import {
  DEFAULT_FIGURES_SPREAD,
  renderAfterword,
  renderChapter1,
  renderDedication,
  renderFourword,
  renderGlossary,
  renderIndex,
  renderListOfFigures,
  renderTableOfContents,
  type RenderContext,
} from './section-renderers';
import { WordInterner } from './word-interner.service';

/** Every kind the loop may add; Chapter 1 only ever opens the book. */
export const GENERATED_KINDS: readonly SectionKind[] = [
  SectionKind.Dedication,
  SectionKind.Fourword,
  SectionKind.TableOfContents,
  SectionKind.Glossary,
  SectionKind.ListOfFigures,
  SectionKind.Index,
  SectionKind.Afterword,
];

const FRONT_KINDS: ReadonlySet<SectionKind> = new Set([
  SectionKind.Dedication,
  SectionKind.Fourword,
  SectionKind.TableOfContents,
]);

export function insertsAtFront(kind: SectionKind): boolean {
  return FRONT_KINDS.has(kind);
}

export interface BookAssemblyOptions {
  /** Source of every random choice made while assembling */
  prng: PRNG;
  /** Static glossary data; closure is checked on every generate() */
  glossaryData: GlossaryData;
  /** Standard deviation of List of Figures values */
  figuresSpread?: number;
  /** Chance of the narrator's Afterword */
  afterwordMetaProbability?: number;
  /** Width of section ids in bits */
  idBits?: number;
}

export class BookAssemblyService {
  private readonly prng: PRNG;
  private readonly glossaryData: GlossaryData;
  private readonly figuresSpread: number;
  private readonly afterwordMetaProbability?: number;
  private readonly idBits?: number;

  constructor(options: BookAssemblyOptions) {
    this.prng = options.prng;
    this.glossaryData = options.glossaryData;
    this.figuresSpread = options.figuresSpread ?? DEFAULT_FIGURES_SPREAD;
    this.afterwordMetaProbability = options.afterwordMetaProbability;
    this.idBits = options.idBits;
  }

  /**
   * Generates a book of at least `wordMinimum` words.
   *
   * @throws {InvalidWordMinimumError} If wordMinimum is not a non-negative integer
   * @throws {GlossaryClosureError} If the glossary data is not closed
   * @throws {UndefinedWordError} If a rendered section uses an unknown word
   */
  generate(wordMinimum: number): SectionRegistry {
    if (!Number.isSafeInteger(wordMinimum) || wordMinimum < 0) {
      throw new InvalidWordMinimumError(wordMinimum);
    }

    const interner = new WordInterner(this.prng);
    const glossary = buildGlossary(interner, this.glossaryData);
    const ctx: RenderContext = {
      interner,
      ids: new SectionIdAllocator(this.prng, { bits: this.idBits }),
      prng: this.prng,
    };
    const registry = new SectionRegistry();

    logLine({
      operation: 'generateBook:start',
      wordMinimum,
      glossaryVersion: this.glossaryData.version,
      glossaryTerms: glossary.size,
    });

    registry.pushBack(renderChapter1(ctx));

    while (registry.totalWordCount() < wordMinimum) {
      const kind = this.prng.choice(GENERATED_KINDS);
      const section = this.render(kind, ctx, glossary, registry);
      if (insertsAtFront(kind)) {
        registry.pushFront(section);
      } else {
        registry.pushBack(section);
      }

      logDebug('generateBook:section', {
        kind,
        id: section.id,
        words: section.content.wordCount(),
        totalWords: registry.totalWordCount(),
        sections: registry.size,
      });
    }

    logLine({
      operation: 'generateBook:complete',
      wordMinimum,
      totalWords: registry.totalWordCount(),
      sections: registry.size,
      distinctWords: interner.size,
    });

    return registry;
  }

  private render(
    kind: SectionKind,
    ctx: RenderContext,
    glossary: Glossary,
    registry: SectionRegistry
  ): Section {
    switch (kind) {
      case SectionKind.Dedication:
        return renderDedication(ctx);
      case SectionKind.Fourword:
        return renderFourword(ctx);
      case SectionKind.TableOfContents:
        return renderTableOfContents(ctx, registry.sections());
      case SectionKind.Glossary:
        return renderGlossary(ctx, glossary, registry.sections());
      case SectionKind.ListOfFigures:
        return renderListOfFigures(ctx, registry.randomSectionId(this.prng), this.figuresSpread);
      case SectionKind.Index:
        return renderIndex(ctx, registry.sections());
      case SectionKind.Afterword:
        return renderAfterword(ctx, () => registry.randomSectionId(this.prng), {
          metaProbability: this.afterwordMetaProbability,
        });
      case SectionKind.Chapter1:
        return renderChapter1(ctx);
    }
  }
}
