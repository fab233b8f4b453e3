/**
 * PRNG Service - Seedable Pseudo-Random Number Generator
 *
 * SplitMix64 expands a single 64-bit seed into the two state words of a
 * Xoroshiro128+ generator. Every random choice the book generator makes
 * (section kinds, section ids, random words, figures) is drawn from one
 * instance, so a fixed seed reproduces a whole book.
 *
 * References:
 * - SplitMix64: https://prng.di.unimi.it/splitmix64.c
 * - Xoroshiro128+: https://prng.di.unimi.it/xoroshiro128plus.c
 *
 * @example
 * ```typescript
 * const prng = new PRNG(12345n);
 * const id = prng.nextUint() >>> 16;        // 16-bit value
 * const kind = prng.nextInt(0, 7);          // 0..6
 * const figure = prng.nextGaussian(0, 3);   // Normal(0, 3)
 * ```
 */

import crypto from 'crypto';

const UINT64_MASK = 0xffffffffffffffffn;
const UINT32_RANGE = 0x100000000;
const SPLITMIX64_GAMMA = 0x9e3779b97f4a7c15n;
const SPLITMIX64_MUL_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_MUL_2 = 0x94d049bb133111ebn;
const XOROSHIRO_ROTL_A = 24n;
const XOROSHIRO_ROTL_B = 37n;
const XOROSHIRO_SHIFT = 16n;

export class PRNG {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - 64-bit seed; wider values are truncated to their low 64 bits
   * @throws {Error} If seed is not a BigInt
   */
  constructor(seed: bigint) {
    if (typeof seed !== 'bigint') {
      throw new Error('seed must be a BigInt');
    }

    let z = seed & UINT64_MASK;
    z = (z + SPLITMIX64_GAMMA) & UINT64_MASK;
    this.state0 = PRNG.splitMix64(z);
    z = (z + SPLITMIX64_GAMMA) & UINT64_MASK;
    this.state1 = PRNG.splitMix64(z);

    // Xoroshiro must never run from the all-zero state.
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = 1n;
    }
  }

  /**
   * Creates a generator seeded from the operating system's entropy source.
   */
  static fromEntropy(): PRNG {
    return new PRNG(crypto.randomBytes(8).readBigUInt64BE(0));
  }

  private static splitMix64(value: bigint): bigint {
    let z = value;
    z = ((z ^ (z >> 30n)) * SPLITMIX64_MUL_1) & UINT64_MASK;
    z = ((z ^ (z >> 27n)) * SPLITMIX64_MUL_2) & UINT64_MASK;
    return z ^ (z >> 31n);
  }

  private static rotl(x: bigint, k: bigint): bigint {
    return ((x << k) | (x >> (64n - k))) & UINT64_MASK;
  }

  /**
   * Xoroshiro128+ step. Returns the next 64-bit output.
   */
  private next(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = (s0 + s1) & UINT64_MASK;

    s1 ^= s0;
    this.state0 = (PRNG.rotl(s0, XOROSHIRO_ROTL_A) ^ s1 ^ (s1 << XOROSHIRO_SHIFT)) & UINT64_MASK;
    this.state1 = PRNG.rotl(s1, XOROSHIRO_ROTL_B);

    return result;
  }

  /**
   * Uniform 32-bit unsigned integer, taken from the upper half of the
   * 64-bit output (the low bits of Xoroshiro128+ are weaker).
   */
  nextUint(): number {
    return Number(this.next() >> 32n) >>> 0;
  }

  /**
   * Uniform float in [0, 1).
   */
  nextFloat(): number {
    return this.nextUint() / UINT32_RANGE;
  }

  /**
   * Uniform integer in [min, max).
   *
   * @throws {RangeError} If the range is empty or not integral
   */
  nextInt(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max <= min) {
      throw new RangeError(`invalid integer range [${min}, ${max})`);
    }
    return min + Math.floor(this.nextFloat() * (max - min));
  }

  /**
   * Sample from Normal(mean, stdDev) using the Box-Muller transform.
   */
  nextGaussian(mean: number = 0, stdDev: number = 1): number {
    // 1 - u keeps the logarithm's argument in (0, 1].
    const u1 = 1 - this.nextFloat();
    const u2 = this.nextFloat();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * stdDev;
  }

  /**
   * Returns true with the given probability.
   */
  chance(probability: number): boolean {
    return this.nextFloat() < probability;
  }

  /**
   * Select a uniformly random element.
   *
   * @throws {Error} If array is empty
   */
  choice<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new Error('Cannot choose from empty array');
    }
    return array[this.nextInt(0, array.length)];
  }
}
