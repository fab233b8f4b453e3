/**
 * TypeScript type definitions for the book generator.
 * These types describe interned words, sections, and the static glossary data
 * loaded from data/glossary.v1.json.
 */

import type { AnnotatedText } from '../services/annotated-text';

/**
 * An identifier for an interned word, based on its index in the
 * `WordInterner`'s arena. Handles are assigned in first-seen order.
 */
export type Word = number;

/**
 * A randomly allocated section identifier (unsigned, fixed width).
 */
export type SectionId = number;

/**
 * Every kind of section the book can contain.
 */
export enum SectionKind {
  Dedication = 'DEDICATION',
  Fourword = 'FOURWORD',
  TableOfContents = 'TABLE_OF_CONTENTS',
  Chapter1 = 'CHAPTER_1',
  Glossary = 'GLOSSARY',
  ListOfFigures = 'LIST_OF_FIGURES',
  Index = 'INDEX',
  Afterword = 'AFTERWORD',
}

/** Heading label printed for each section kind. */
export const SECTION_LABELS: Readonly<Record<SectionKind, string>> = {
  [SectionKind.Dedication]: 'Dedication',
  [SectionKind.Fourword]: 'Fourword',
  [SectionKind.TableOfContents]: 'Table of Contents',
  [SectionKind.Chapter1]: 'Chapter 1',
  [SectionKind.Glossary]: 'Glossary',
  [SectionKind.ListOfFigures]: 'List of Figures',
  [SectionKind.Index]: 'Index',
  [SectionKind.Afterword]: 'Afterword',
};

/**
 * One titled unit of generated content. Immutable once rendered.
 */
export interface Section {
  readonly id: SectionId;
  readonly kind: SectionKind;
  readonly content: AnnotatedText;
}

/**
 * A glossary term paired with its literal definition.
 *
 * @example
 * { term: "list", definition: "Nothing, or cons." }
 */
export interface DefinedTerm {
  term: string;
  definition: string;
}

/**
 * Root structure of data/glossary.v1.json.
 *
 * @example
 * {
 *   version: "v1",
 *   randomSignal: "::::",
 *   defined: [{ term: "cons", definition: "Something, and a list." }],
 *   undefined: ["and", "a"]
 * }
 */
export interface GlossaryData {
  /** Version identifier for the glossary data (e.g., "v1") */
  version: string;
  /** Definition text that means "refer to a random word at render time" */
  randomSignal: string;
  /** Terms with a definition, in the order they are interned */
  defined: DefinedTerm[];
  /** Terms that are known but deliberately left without a definition */
  undefined: string[];
}
