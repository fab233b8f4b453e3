/**
 * Section renderers.
 *
 * Each renderer reads the current sections (never mutates them), allocates
 * its own id and returns one new immutable section. Every word a renderer
 * writes must be a glossary key, and every section id it mentions must
 * already be allocated.
 */

import {
  SECTION_LABELS,
  SectionKind,
  type Section,
  type SectionId,
  type Word,
} from '../types/book.types';
import { UndefinedWordError } from '../utils/error-handler';
import { AnnotatedText } from './annotated-text';
import type { Glossary } from './glossary.service';
import type { PRNG } from './prng.service';
import type { SectionIdAllocator } from './section-id.service';
import type { WordInterner } from './word-interner.service';

export interface RenderContext {
  interner: WordInterner;
  ids: SectionIdAllocator;
  prng: PRNG;
}

export const FIGURE_COUNT_MIN = 5;
export const FIGURE_COUNT_MAX = 30;
export const FIGURE_FOOTNOTE_PROBABILITY = 1 / 10;
export const DEFAULT_FIGURES_SPREAD = 3.0;
export const AFTERWORD_META_PROBABILITY = 1 / 10_000_000;
export const LUCKY_NUMBER_COUNT_MIN = 3;
export const LUCKY_NUMBER_COUNT_MAX = 16;

const META_AFTERWORD =
  "Hello, dear reader! I'm the narrator of the text you're reading. Not the author, " +
  "but the character they're playing.\n\n" +
  'I have a suggestion for you. Go into this book\'s source code and find the part that ' +
  "generates this message. What's the probability it would appear? Go on, look. I can wait.\n\n" +
  "It's pretty low, isn't it? Do you think the book you're reading just happened to have it? " +
  'Or do you think the author chose one that did on purpose?\n\n' +
  'This entire book *could*, in theory, have been generated by precisely the code I shared. ' +
  'But *was* it?\n\n' +
  'Are the section IDs I used *really* random? What about the fourwords? Or is there ' +
  'something else going on?\n\n' +
  'Have fun.\n\n';

export function heading(kind: SectionKind, id: SectionId): string {
  return `## ${SECTION_LABELS[kind]} (#${id})`;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function createSection(
  ctx: RenderContext,
  kind: SectionKind,
  body: (id: SectionId) => string
): Section {
  const id = ctx.ids.allocate();
  return {
    id,
    kind,
    content: AnnotatedText.annotate(ctx.interner, `${heading(kind, id)}${body(id)}`),
  };
}

export function renderChapter1(ctx: RenderContext): Section {
  return createSection(ctx, SectionKind.Chapter1, () => '\n\n\\<Insert academia joke here>');
}

export function renderDedication(ctx: RenderContext): Section {
  return createSection(
    ctx,
    SectionKind.Dedication,
    id =>
      '\n\nAll material following this dedication is dedicated to the NaNoGenMo 2019 community, ' +
      `with the exception of sections with an ID higher than this one (#${id}).`
  );
}

/**
 * Four independent random words; repeats are allowed.
 */
export function renderFourword(ctx: RenderContext): Section {
  return createSection(ctx, SectionKind.Fourword, () => {
    const words = [
      capitalize(ctx.interner.pickRandom()),
      ctx.interner.pickRandom(),
      ctx.interner.pickRandom(),
      ctx.interner.pickRandom(),
    ];
    return `\n\n${words.join(' ')}.`;
  });
}

/**
 * Snapshot of the sections that exist right now, in book order.
 */
export function renderTableOfContents(
  ctx: RenderContext,
  sections: readonly Section[]
): Section {
  return createSection(ctx, SectionKind.TableOfContents, () => {
    let body = '\n';
    for (const section of sections) {
      body += `\n- **${SECTION_LABELS[section.kind]}** (#${section.id})`;
    }
    return body;
  });
}

function distinctWords(sections: readonly Section[]): Word[] {
  const words = new Set<Word>();
  for (const section of sections) {
    for (const word of section.content.words) {
      words.add(word);
    }
  }
  return [...words].sort((a, b) => a - b);
}

/**
 * Defines every word used so far that has a definition.
 *
 * @throws {UndefinedWordError} If a section uses a word the glossary does not know
 */
export function renderGlossary(
  ctx: RenderContext,
  glossary: Glossary,
  sections: readonly Section[]
): Section {
  const words = distinctWords(sections);
  for (const word of words) {
    if (!glossary.has(word)) {
      throw new UndefinedWordError(ctx.interner.resolve(word));
    }
  }

  return createSection(ctx, SectionKind.Glossary, () => {
    let body = '\n';
    for (const word of words) {
      const definition = glossary.definitionOf(word, ctx.interner);
      if (definition === null) {
        continue;
      }
      body += `\n- **${ctx.interner.resolve(word)}** - `;
      body += glossary.isRandomSignal(definition)
        ? `See '${ctx.interner.pickRandom()}.'`
        : definition.content;
    }
    return body;
  });
}

/**
 * Random figures. The footnote, if any figure carries one, names
 * `existingSectionId`, which the caller draws from the current sections.
 */
export function renderListOfFigures(
  ctx: RenderContext,
  existingSectionId: SectionId,
  spread: number = DEFAULT_FIGURES_SPREAD
): Section {
  return createSection(ctx, SectionKind.ListOfFigures, () => {
    const quantity = ctx.prng.nextInt(FIGURE_COUNT_MIN, FIGURE_COUNT_MAX);
    let body = '\n';
    let footnote = false;
    for (let i = 0; i < quantity; i++) {
      body += `\n- ${ctx.prng.nextGaussian(0, spread).toFixed(3)}`;
      if (ctx.prng.chance(FIGURE_FOOTNOTE_PROBABILITY)) {
        body += ' (*)';
        footnote = true;
      }
    }
    if (footnote) {
      body +=
        '\n\n(*) The accuracy of these numbers is not known. It is recommended not to trust ' +
        `them when reading section #${existingSectionId}.`;
    }
    return body;
  });
}

/**
 * For each word, the ascending ids of the sections it occurs in.
 */
export function renderIndex(ctx: RenderContext, sections: readonly Section[]): Section {
  const uses = new Map<Word, Set<SectionId>>();
  for (const section of sections) {
    for (const word of section.content.words) {
      let ids = uses.get(word);
      if (!ids) {
        ids = new Set();
        uses.set(word, ids);
      }
      ids.add(section.id);
    }
  }

  return createSection(ctx, SectionKind.Index, () => {
    let body = '\n';
    const words = [...uses.keys()].sort((a, b) => a - b);
    for (const word of words) {
      const ids = [...(uses.get(word) ?? [])].sort((a, b) => a - b);
      body += `\n- **${ctx.interner.resolve(word)}** - ${ids.map(id => `#${id}`).join(', ')}`;
    }
    return body;
  });
}

export interface AfterwordOptions {
  /** Chance of the narrator's message instead of a single word */
  metaProbability?: number;
}

/**
 * Usually a single random word. Very rarely, the narrator speaks and lists
 * some lucky section numbers, each drawn by `existingSectionId`.
 */
export function renderAfterword(
  ctx: RenderContext,
  existingSectionId: () => SectionId,
  options: AfterwordOptions = {}
): Section {
  const metaProbability = options.metaProbability ?? AFTERWORD_META_PROBABILITY;

  return createSection(ctx, SectionKind.Afterword, () => {
    if (!ctx.prng.chance(metaProbability)) {
      return `\n\n${capitalize(ctx.interner.pickRandom())}`;
    }

    const quantity = ctx.prng.nextInt(LUCKY_NUMBER_COUNT_MIN, LUCKY_NUMBER_COUNT_MAX);
    let body = `\n\n${META_AFTERWORD}`;
    for (let i = 0; i < quantity; i++) {
      if (i === 0) {
        body += 'P.S. your lucky section numbers are ';
      } else if (i === quantity - 1) {
        body += ', and ';
      } else {
        body += ', ';
      }
      body += `#${existingSectionId()}`;
    }
    return `${body}.`;
  });
}
