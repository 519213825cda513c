import { Random, type RandomSource } from "../Random/Random.ts";

/** The host's default, non-deterministic source. */
export const PlatformRandomSource: RandomSource = {
  next32() {
    return Math.floor(Math.random() * 2 ** 32) >>> 0;
  },
};

export function platformRandom(): Random {
  return new Random(PlatformRandomSource);
}
