/**
 * Deterministic Value Generators
 *
 * An Arbitrary maps a seed to a value, so a failing trial can be replayed
 * from its seed alone. Small seeds produce edge cases first.
 */

import { Maybe } from "../data/maybe.js";

export interface Arbitrary<A> {
  readonly arbitrary: (seed: number) => A;
}

/**
 * One mulberry32 step: a well-spread unsigned 32-bit value for a seed.
 */
export function scramble(seed: number): number {
  let t = (seed + 0x6d2b79f5) | 0;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return (t ^ (t >>> 14)) >>> 0;
}

const INTEGER_EDGES = [0, 1, -1];

/**
 * Integers in [-1000, 1000], starting with 0, 1 and -1.
 */
export const arbitraryInteger: Arbitrary<number> = {
  arbitrary: (seed) =>
    seed >= 0 && seed < INTEGER_EDGES.length ? INTEGER_EDGES[seed] : (scramble(seed) % 2001) - 1000,
};

const ALPHABET = "abcxyz 01";

/**
 * Short strings (up to 7 characters), starting with the empty string.
 */
export const arbitraryString: Arbitrary<string> = {
  arbitrary: (seed) => {
    if (seed === 0) return "";
    const length = scramble(seed) % 8;
    let out = "";
    for (let i = 0; i < length; i++) {
      out += ALPHABET[scramble(seed * 8 + i) % ALPHABET.length];
    }
    return out;
  },
};

/**
 * Maybes over `inner`: every fourth seed (including 0) is unknown.
 */
export function arbitraryMaybe<A>(inner: Arbitrary<A>): Arbitrary<Maybe<A>> {
  return {
    arbitrary: (seed) =>
      seed % 4 === 0 ? Maybe.unknown<A>() : Maybe.definitely(inner.arbitrary(seed)),
  };
}

export function constant<A>(value: A): Arbitrary<A> {
  return { arbitrary: () => value };
}

/**
 * Cycles through the given values in order.
 */
export function oneOf<A>(values: readonly A[]): Arbitrary<A> {
  if (values.length === 0) {
    throw new RangeError("oneOf needs at least one value");
  }
  return { arbitrary: (seed) => values[Math.abs(seed) % values.length] };
}
