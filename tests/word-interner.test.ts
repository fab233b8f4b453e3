import { describe, it, expect } from 'vitest';
import { WordInterner } from '../src/services/word-interner.service';
import { PRNG } from '../src/services/prng.service';
import { InvalidWordError } from '../src/utils/error-handler';

describe('WordInterner', () => {
  it('should return the same handle for the same spelling', () => {
    const interner = new WordInterner(new PRNG(1n));

    const first = interner.intern('dog');
    const second = interner.intern('dog');

    expect(second).toBe(first);
    expect(interner.size).toBe(1);
  });

  it('should assign handles in first-seen order', () => {
    const interner = new WordInterner(new PRNG(1n));

    expect(interner.intern('cat')).toBe(0);
    expect(interner.intern('dog')).toBe(1);
    expect(interner.intern('cat')).toBe(0);
    expect(interner.intern("you're")).toBe(2);
  });

  it('should resolve a handle back to its spelling', () => {
    const interner = new WordInterner(new PRNG(1n));

    expect(interner.resolve(interner.intern("it's"))).toBe("it's");
  });

  it('should throw on an unknown handle', () => {
    const interner = new WordInterner(new PRNG(1n));

    expect(() => interner.resolve(3)).toThrow(RangeError);
  });

  it.each(['Dog', 'dog1', "dog'", "'dog", 'two words', '', "rock'n'roll'"])(
    'should reject %j as a programmer error',
    text => {
      const interner = new WordInterner(new PRNG(1n));

      expect(() => interner.intern(text)).toThrow(InvalidWordError);
      expect(interner.size).toBe(0);
    }
  );

  describe('pickRandom()', () => {
    it('should fail before anything is interned', () => {
      const interner = new WordInterner(new PRNG(1n));

      expect(() => interner.pickRandom()).toThrow('before any word is interned');
    });

    it('should only return interned words and eventually all of them', () => {
      const interner = new WordInterner(new PRNG(77n));
      const words = ['one', 'two', 'three', 'four'];
      words.forEach(word => interner.intern(word));

      const picked = new Set<string>();
      for (let i = 0; i < 200; i++) {
        picked.add(interner.pickRandom());
      }

      expect([...picked].sort()).toEqual([...words].sort());
    });
  });
});
