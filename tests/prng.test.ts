/**
 * PRNG Service Tests
 *
 * Verifies determinism, ranges and rough distribution of the seedable
 * generator that drives every random choice in a book.
 */

import { describe, it, expect } from 'vitest';
import { PRNG } from '../src/services/prng.service';

describe('PRNG Service', () => {
  describe('Constructor', () => {
    it('should initialize with a BigInt seed', () => {
      expect(() => new PRNG(12345n)).not.toThrow();
    });

    it('should accept a zero seed', () => {
      const prng = new PRNG(0n);
      const values = Array.from({ length: 5 }, () => prng.nextUint());

      expect(new Set(values).size).toBeGreaterThan(1);
    });

    it('should create an entropy-seeded generator', () => {
      const prng = PRNG.fromEntropy();
      const value = prng.nextFloat();

      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  describe('Determinism', () => {
    it('should produce identical sequences for same seed', () => {
      const prng1 = new PRNG(12345n);
      const prng2 = new PRNG(12345n);

      const sequence1 = Array.from({ length: 10 }, () => prng1.nextUint());
      const sequence2 = Array.from({ length: 10 }, () => prng2.nextUint());

      expect(sequence1).toEqual(sequence2);
    });

    it('should produce different sequences for different seeds', () => {
      const prng1 = new PRNG(12345n);
      const prng2 = new PRNG(54321n);

      const sequence1 = Array.from({ length: 10 }, () => prng1.nextUint());
      const sequence2 = Array.from({ length: 10 }, () => prng2.nextUint());

      expect(sequence1).not.toEqual(sequence2);
    });

    it('should treat seeds modulo 2^64', () => {
      const prng1 = new PRNG(7n);
      const prng2 = new PRNG(7n + 2n ** 64n);

      expect(prng1.nextUint()).toBe(prng2.nextUint());
    });
  });

  describe('nextUint()', () => {
    it('should return 32-bit unsigned integers', () => {
      const prng = new PRNG(12345n);

      for (let i = 0; i < 100; i++) {
        const value = prng.nextUint();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(2 ** 32);
        expect(Number.isInteger(value)).toBe(true);
      }
    });

    it('should have roughly uniform distribution', () => {
      const prng = new PRNG(12345n);
      const buckets = new Array<number>(10).fill(0);
      const iterations = 10000;

      for (let i = 0; i < iterations; i++) {
        buckets[Math.floor((prng.nextUint() / 2 ** 32) * 10)]++;
      }

      // Each bucket should hold roughly 1000 values; allow 20% deviation
      for (const count of buckets) {
        expect(count).toBeGreaterThan(800);
        expect(count).toBeLessThan(1200);
      }
    });
  });

  describe('nextInt()', () => {
    it('should stay within [min, max)', () => {
      const prng = new PRNG(2024n);
      const seen = new Set<number>();

      for (let i = 0; i < 500; i++) {
        const value = prng.nextInt(5, 30);
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(5);
        expect(value).toBeLessThan(30);
        seen.add(value);
      }

      expect(seen.size).toBe(25);
    });

    it('should return min for a single-value range', () => {
      const prng = new PRNG(1n);

      expect(prng.nextInt(3, 4)).toBe(3);
    });

    it('should reject empty or fractional ranges', () => {
      const prng = new PRNG(1n);

      expect(() => prng.nextInt(4, 4)).toThrow(RangeError);
      expect(() => prng.nextInt(0, 2.5)).toThrow(RangeError);
    });
  });

  describe('nextGaussian()', () => {
    it('should centre on the mean with the requested spread', () => {
      const prng = new PRNG(98765n);
      const samples = Array.from({ length: 5000 }, () => prng.nextGaussian(0, 3));

      const mean = samples.reduce((sum, x) => sum + x, 0) / samples.length;
      const variance =
        samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / samples.length;

      expect(Math.abs(mean)).toBeLessThan(0.3);
      expect(Math.sqrt(variance)).toBeGreaterThan(2.7);
      expect(Math.sqrt(variance)).toBeLessThan(3.3);
    });

    it('should always be finite', () => {
      const prng = new PRNG(5n);

      for (let i = 0; i < 1000; i++) {
        expect(Number.isFinite(prng.nextGaussian())).toBe(true);
      }
    });
  });

  describe('chance()', () => {
    it('should never fire at probability 0 and always at 1', () => {
      const prng = new PRNG(42n);

      for (let i = 0; i < 100; i++) {
        expect(prng.chance(0)).toBe(false);
        expect(prng.chance(1)).toBe(true);
      }
    });

    it('should fire at roughly the requested rate', () => {
      const prng = new PRNG(4242n);
      let hits = 0;

      for (let i = 0; i < 10000; i++) {
        if (prng.chance(0.1)) {
          hits++;
        }
      }

      expect(hits).toBeGreaterThan(800);
      expect(hits).toBeLessThan(1200);
    });
  });

  describe('choice()', () => {
    it('should throw error on empty array', () => {
      const prng = new PRNG(12345n);

      expect(() => prng.choice([])).toThrow('Cannot choose from empty array');
    });

    it('should select all elements over many iterations', () => {
      const prng = new PRNG(12345n);
      const input = ['a', 'b', 'c', 'd', 'e'];
      const selected = new Set<string>();

      for (let i = 0; i < 100; i++) {
        selected.add(prng.choice(input));
      }

      expect(selected.size).toBe(input.length);
    });

    it('should handle single element array', () => {
      const prng = new PRNG(12345n);

      expect(prng.choice([42])).toBe(42);
    });
  });
});
