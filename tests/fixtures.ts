/**
 * Shared builders for renderer and assembly tests.
 */

import { AnnotatedText } from '../src/services/annotated-text';
import { PRNG } from '../src/services/prng.service';
import type { RenderContext } from '../src/services/section-renderers';
import { SectionIdAllocator } from '../src/services/section-id.service';
import { WordInterner } from '../src/services/word-interner.service';
import type { GlossaryData, Section, SectionId, SectionKind } from '../src/types/book.types';

export function createContext(seed: bigint = 12345n): RenderContext {
  const prng = new PRNG(seed);
  return {
    prng,
    interner: new WordInterner(prng),
    ids: new SectionIdAllocator(prng),
  };
}

/**
 * A hand-made section; the id is not registered with any allocator.
 */
export function makeSection(
  ctx: RenderContext,
  id: SectionId,
  kind: SectionKind,
  content: string
): Section {
  return { id, kind, content: AnnotatedText.annotate(ctx.interner, content) };
}

export function smallGlossaryData(overrides: Partial<GlossaryData> = {}): GlossaryData {
  return {
    version: 'test',
    randomSignal: '::::',
    defined: [
      { term: 'cat', definition: 'A small dog.' },
      { term: 'dog', definition: 'A big cat.' },
      { term: 'random', definition: '::::' },
    ],
    undefined: ['a', 'small', 'big'],
    ...overrides,
  };
}
