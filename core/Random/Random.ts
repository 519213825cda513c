import { Pcg32Source } from "./Pcg32Source.ts";

export interface RandomSource {
  /** Returns a uniformly distributed unsigned 32-bit integer. */
  next32(): number;
}

export class Random {
  constructor(private readonly source: RandomSource) {}

  static withSeed(seed: number): Random {
    return new Random(Pcg32Source.fromSeed(seed));
  }

  /** Generates a random number r where 0 <= r < 1 */
  float(): number {
    return this.source.next32() / 2 ** 32;
  }

  /** Generates a random number between min and max by lerping with `float()` */
  range(min: number, max: number): number {
    return min + (max - min) * this.float();
  }

  /** Generates a random integer r where min <= r < max */
  int(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max)) {
      throw new RangeError(`int bounds must be integers, got [${min}, ${max})`);
    }
    if (max < min) {
      throw new RangeError(`int max must not be less than min, got [${min}, ${max})`);
    }
    if (max === min) return min;
    return min + this._bounded(max - min);
  }

  of<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new RangeError("cannot pick from an empty array");
    }
    return array[this.int(0, array.length)];
  }

  // Generate a uniformly distributed number, r, where 0 <= r < bound
  private _bounded(bound: number): number {
    if (bound > 2 ** 32) {
      throw new RangeError(`int range too large: ${bound}`);
    }

    // Drop outputs below 2^32 % bound so the accepted range is a multiple of
    // bound.
    const threshold = (2 ** 32 - bound) % bound;
    for (;;) {
      const r = this.source.next32();
      if (r >= threshold) return r % bound;
    }
  }
}
