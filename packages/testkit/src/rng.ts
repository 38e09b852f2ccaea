/**
 * Deterministic random numbers for reproducible workloads
 */

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * xorshift32 generator. The stream name is mixed into the seed so that one seed
 * can drive several independent streams (population, operations, ...).
 */
export class SeededRandom {
  private x: number;

  constructor(seed: number, stream = "default") {
    const state = ((seed >>> 0) ^ fnv1a32(stream)) >>> 0;
    // xorshift never leaves the all-zero state
    this.x = state === 0 ? 0x9e3779b9 : state;
  }

  /** Next uint32 value */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Float in [0, 1) */
  nextFloat(): number {
    return this.next() / 0x100000000;
  }

  /**
   * Integer in `[0, bound)`
   */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.nextFloat() * bound);
  }

  /** Signed 32-bit value */
  nextInt32(): number {
    return this.next() | 0;
  }
}
