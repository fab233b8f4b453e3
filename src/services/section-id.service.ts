/**
 * Section ID allocator.
 *
 * Draws uniformly random fixed-width unsigned integers and redraws on
 * collision, so every id handed out in one run is unique. Redraws are capped;
 * running out means the id space is too small for the requested book.
 */

import type { SectionId } from '../types/book.types';
import { ConfigurationError, IdSpaceExhaustedError } from '../utils/error-handler';
import type { PRNG } from './prng.service';

export const DEFAULT_ID_BITS = 16;
export const DEFAULT_MAX_ATTEMPTS = 4096;

export interface SectionIdAllocatorOptions {
  /** Width of the id space in bits (1-32) */
  bits?: number;
  /** Draws per allocation before giving up */
  maxAttempts?: number;
}

export class SectionIdAllocator {
  private readonly used = new Set<SectionId>();
  private readonly bits: number;
  private readonly maxAttempts: number;

  constructor(
    private readonly prng: PRNG,
    options: SectionIdAllocatorOptions = {}
  ) {
    const bits = options.bits ?? DEFAULT_ID_BITS;
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new ConfigurationError('section id width must be an integer between 1 and 32', {
        received: bits,
      });
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError('maxAttempts must be a positive integer', {
        received: maxAttempts,
      });
    }
    this.bits = bits;
    this.maxAttempts = maxAttempts;
  }

  get allocatedCount(): number {
    return this.used.size;
  }

  isAllocated(id: SectionId): boolean {
    return this.used.has(id);
  }

  /**
   * @throws {IdSpaceExhaustedError} If no free id turns up within maxAttempts draws
   */
  allocate(): SectionId {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const id = this.prng.nextUint() >>> (32 - this.bits);
      if (!this.used.has(id)) {
        this.used.add(id);
        return id;
      }
    }
    throw new IdSpaceExhaustedError(this.bits, this.maxAttempts, this.used.size);
  }
}
