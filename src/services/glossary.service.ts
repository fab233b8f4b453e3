/**
 * Glossary Service - the closed, static word → definition table.
 *
 * Built once per run from data/glossary.v1.json. Every word is either defined
 * (its definition is itself annotated text) or explicitly left undefined.
 * The table must be closed: every word used by a definition is a key. That is
 * checked once, after all entries are in, so renderers can rely on it.
 *
 * @example
 * ```typescript
 * const interner = new WordInterner(prng);
 * const glossary = buildGlossary(interner, loadGlossaryData());
 * glossary.definitionOf(interner.intern('list'))?.content; // "Nothing, or cons."
 * ```
 */

import fs from 'fs';
import path from 'path';
import type { DefinedTerm, GlossaryData, Word } from '../types/book.types';
import {
  GlossaryClosureError,
  GlossaryDataError,
  UndefinedWordError,
} from '../utils/error-handler';
import { logLine } from '../utils/logger';
import { AnnotatedText } from './annotated-text';
import type { WordInterner } from './word-interner.service';

/** Bundled glossary, relative to the package root. */
export const DEFAULT_GLOSSARY_PATH = 'data/glossary.v1.json';

// Same depth from src/services and dist/services.
const PACKAGE_ROOT = path.resolve(__dirname, '..', '..');

/** A definition, or null for a word that is known but left undefined. */
export type GlossaryEntry = AnnotatedText | null;

export class Glossary {
  constructor(
    private readonly entries: ReadonlyMap<Word, GlossaryEntry>,
    readonly randomSignal: string
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(word: Word): boolean {
    return this.entries.has(word);
  }

  /**
   * @throws {UndefinedWordError} If the word is not a glossary key
   */
  definitionOf(word: Word, interner: WordInterner): GlossaryEntry {
    const entry = this.entries.get(word);
    if (entry === undefined) {
      throw new UndefinedWordError(interner.resolve(word));
    }
    return entry;
  }

  /**
   * True for the sentinel definition meaning "refer to a random word".
   */
  isRandomSignal(definition: AnnotatedText): boolean {
    return definition.content === this.randomSignal;
  }

  terms(): IterableIterator<Word> {
    return this.entries.keys();
  }
}

function isDefinedTerm(value: unknown): value is DefinedTerm {
  return (
    typeof value === 'object' &&
    value !== null &&
    'term' in value &&
    'definition' in value &&
    typeof value.term === 'string' &&
    typeof value.definition === 'string'
  );
}

/**
 * Structural check for parsed glossary JSON.
 */
export function isGlossaryData(value: unknown): value is GlossaryData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    'randomSignal' in value &&
    'defined' in value &&
    'undefined' in value &&
    typeof value.version === 'string' &&
    value.version.length > 0 &&
    typeof value.randomSignal === 'string' &&
    value.randomSignal.length > 0 &&
    Array.isArray(value.defined) &&
    value.defined.every(isDefinedTerm) &&
    Array.isArray(value.undefined) &&
    value.undefined.every(term => typeof term === 'string')
  );
}

/**
 * Loads glossary data from disk.
 *
 * Without a path the bundled file is read from the package, wherever the
 * process was started. An explicit relative path is resolved against the
 * working directory.
 *
 * @throws {GlossaryDataError} If the file is missing, not JSON, or malformed
 */
export function loadGlossaryData(filePath?: string): GlossaryData {
  const displayPath = filePath ?? DEFAULT_GLOSSARY_PATH;
  const resolved =
    filePath === undefined
      ? path.join(PACKAGE_ROOT, DEFAULT_GLOSSARY_PATH)
      : path.resolve(process.cwd(), filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new GlossaryDataError(
      `Failed to load glossary from ${displayPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: resolved }
    );
  }

  if (!isGlossaryData(parsed)) {
    throw new GlossaryDataError(
      `Invalid glossary structure in ${displayPath}: expected version, randomSignal, defined and undefined`,
      { path: resolved }
    );
  }

  logLine({
    operation: 'loadGlossaryData',
    path: displayPath,
    version: parsed.version,
    defined: parsed.defined.length,
    undefined: parsed.undefined.length,
  });

  return parsed;
}

/**
 * Builds the global glossary and enforces closure.
 *
 * Called exactly once per run, before any section is rendered.
 *
 * @throws {GlossaryDataError} If a term appears twice or is not a lowercase word
 * @throws {GlossaryClosureError} Naming the first definition word that is not a key
 */
export function buildGlossary(interner: WordInterner, data: GlossaryData): Glossary {
  const entries = new Map<Word, GlossaryEntry>();
  const internTerm = (term: string): Word => {
    let word: Word;
    try {
      word = interner.intern(term);
    } catch (error) {
      throw new GlossaryDataError(`Glossary term '${term}' is not a lowercase word`, {
        term,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    if (entries.has(word)) {
      throw new GlossaryDataError(`Glossary term '${term}' is listed more than once`, { term });
    }
    return word;
  };

  const definedTerms: [Word, AnnotatedText][] = [];
  for (const { term, definition } of data.defined) {
    const word = internTerm(term);
    const annotated = AnnotatedText.annotate(interner, definition);
    entries.set(word, annotated);
    definedTerms.push([word, annotated]);
  }
  for (const term of data.undefined) {
    entries.set(internTerm(term), null);
  }

  // Closure: a definition may only use words the glossary knows about.
  for (const [term, definition] of definedTerms) {
    for (const word of definition.words) {
      if (!entries.has(word)) {
        throw new GlossaryClosureError(interner.resolve(word), interner.resolve(term));
      }
    }
  }

  return new Glossary(entries, data.randomSignal);
}
