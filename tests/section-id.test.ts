import { describe, it, expect } from 'vitest';
import { SectionIdAllocator } from '../src/services/section-id.service';
import { PRNG } from '../src/services/prng.service';
import { ConfigurationError, IdSpaceExhaustedError } from '../src/utils/error-handler';

describe('SectionIdAllocator', () => {
  it('should allocate 200 distinct 16-bit ids', () => {
    const allocator = new SectionIdAllocator(new PRNG(12345n));

    const ids = Array.from({ length: 200 }, () => allocator.allocate());

    expect(new Set(ids).size).toBe(200);
    expect(allocator.allocatedCount).toBe(200);
    for (const id of ids) {
      expect(Number.isInteger(id)).toBe(true);
      expect(id).toBeGreaterThanOrEqual(0);
      expect(id).toBeLessThan(2 ** 16);
      expect(allocator.isAllocated(id)).toBe(true);
    }
  });

  it('should fill a tiny id space completely by redrawing collisions', () => {
    const allocator = new SectionIdAllocator(new PRNG(3n), { bits: 2 });

    const ids = Array.from({ length: 4 }, () => allocator.allocate());

    expect([...ids].sort()).toEqual([0, 1, 2, 3]);
  });

  it('should fail once the id space is exhausted', () => {
    const allocator = new SectionIdAllocator(new PRNG(3n), { bits: 1, maxAttempts: 50 });
    allocator.allocate();
    allocator.allocate();

    expect(() => allocator.allocate()).toThrow(IdSpaceExhaustedError);
    expect(() => allocator.allocate()).toThrow(
      'No free 1-bit section id found after 50 attempts (2 allocated)'
    );
  });

  it('should support 32-bit ids', () => {
    const allocator = new SectionIdAllocator(new PRNG(9n), { bits: 32 });

    const id = allocator.allocate();

    expect(id).toBeGreaterThanOrEqual(0);
    expect(id).toBeLessThan(2 ** 32);
  });

  it.each([0, 33, 2.5])('should reject an id width of %d bits', bits => {
    expect(() => new SectionIdAllocator(new PRNG(1n), { bits })).toThrow(ConfigurationError);
  });

  it('should reject a non-positive attempt cap', () => {
    expect(() => new SectionIdAllocator(new PRNG(1n), { maxAttempts: 0 })).toThrow(
      ConfigurationError
    );
  });
});
