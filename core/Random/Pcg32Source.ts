import type { RandomSource } from "./Random.ts";

// Adapted from <https://github.com/imneme/pcg-c-basic/blob/bc39cd76ac3d541e618606bcc6e1e5ba5e5e6aa3/pcg_basic.c>

/*
 * PCG Random Number Generation for C.
 *
 * Copyright 2014 Melissa O'Neill <oneill@pcg-random.org>
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 *
 * For additional information about the PCG random number generation scheme,
 * including its license and other licensing options, visit
 *
 *       http://www.pcg-random.org
 */

/** An unsigned 64-bit value split into two unsigned 32-bit halves. */
export interface U64 {
  hi: number;
  lo: number;
}

// 6364136223846793005
const MULTIPLIER: U64 = { hi: 0x5851f42d, lo: 0x4c957f2d };

// Stream used by seeded channels. Any odd increment selects a distinct sequence.
const DEFAULT_STREAM: U64 = { hi: 0xda3e39cb, lo: 0x94b95bdb };

/** pcg32 (XSH RR 64/32): 64 bits of state, 32-bit outputs. */
export class Pcg32Source implements RandomSource {
  private _state: U64 = { hi: 0, lo: 0 };
  private readonly _inc: U64;

  /** Equivalent to `pcg32_srandom_r(rng, initState, initSeq)`. */
  constructor(initState: U64, initSeq: U64) {
    const seqHi = initSeq.hi >>> 0;
    const seqLo = initSeq.lo >>> 0;
    // inc = (initseq << 1) | 1
    this._inc = {
      hi: ((seqHi << 1) | (seqLo >>> 31)) >>> 0,
      lo: ((seqLo << 1) | 1) >>> 0,
    };

    this.next32();
    this._state = add64(this._state, {
      hi: initState.hi >>> 0,
      lo: initState.lo >>> 0,
    });
    this.next32();
  }

  /** Seeds from an integer, sign-extended to 64 bits. */
  static fromSeed(seed: number): Pcg32Source {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`seed must be a safe integer, got ${seed}`);
    }
    const state: U64 = {
      hi: Math.floor(seed / 2 ** 32) >>> 0,
      lo: seed >>> 0,
    };
    return new Pcg32Source(state, DEFAULT_STREAM);
  }

  next32(): number {
    const old = this._state;

    // state = oldstate * MULTIPLIER + inc
    this._state = add64(mul64(old, MULTIPLIER), this._inc);

    // xorshifted = ((oldstate >> 18) ^ oldstate) >> 27
    const xsHi = ((old.hi >>> 18) ^ old.hi) >>> 0;
    const xsLo = (((old.lo >>> 18) | (old.hi << 14)) ^ old.lo) >>> 0;
    const xorshifted = ((xsLo >>> 27) | (xsHi << 5)) >>> 0;

    // rot = oldstate >> 59
    const rot = old.hi >>> 27;
    return ((xorshifted >>> rot) | (xorshifted << (-rot & 31))) >>> 0;
  }
}

function mul64(a: U64, b: U64): U64 {
  const aHi = a.hi >>> 0;
  const aLo = a.lo >>> 0;
  const bHi = b.hi >>> 0;
  const bLo = b.lo >>> 0;

  // Full 64-bit product of the low words, built from 16-bit limbs so no
  // intermediate exceeds 2^32.
  const a1 = aLo >>> 16;
  const a0 = aLo & 0xffff;
  const b1 = bLo >>> 16;
  const b0 = bLo & 0xffff;

  const cross1 = a1 * b0;
  const cross2 = a0 * b1;
  const crossLo = ((cross1 << 16) + (cross2 << 16)) >>> 0;
  const crossCarry = crossLo < (cross1 << 16) >>> 0 ? 1 : 0;
  const crossHi = (cross1 >>> 16) + (cross2 >>> 16) + crossCarry;

  const low = a0 * b0;
  const lo = (crossLo + low) >>> 0;
  const lowCarry = lo < low ? 1 : 0;
  const hiFromLow = (a1 * b1 + crossHi + lowCarry) >>> 0;

  // The high words only contribute their low 32 bits.
  const hi = (Math.imul(aLo, bHi) + Math.imul(aHi, bLo) + hiFromLow) >>> 0;
  return { hi, lo };
}

function add64(a: U64, b: U64): U64 {
  const lo = ((a.lo >>> 0) + (b.lo >>> 0)) >>> 0;
  const carry = lo < a.lo >>> 0 ? 1 : 0;
  const hi = ((a.hi >>> 0) + (b.hi >>> 0) + carry) >>> 0;
  return { hi, lo };
}
