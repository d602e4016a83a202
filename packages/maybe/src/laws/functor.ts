/**
 * Functor Laws for Maybe.map
 *
 *   - Identity: m.map(a => a) equals m
 *   - Composition: m.map(f).map(g) equals m.map(a => g(f(a)))
 *
 * @module
 */

import type { Maybe } from "../data/maybe.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

/**
 * @param eqA - compares the input Maybes
 * @param eqC - compares the results of mapping `f` then `g`
 *
 * @example
 * ```typescript
 * const laws = functorLaws(getEq(eqNumber), getEq(eqString), (n) => n * 2, String);
 * assertLaws(laws, [arbitraryMaybe(arbitraryInteger)]);
 * ```
 */
export function functorLaws<A, B, C>(
  eqA: Eq<Maybe<A>>,
  eqC: Eq<Maybe<C>>,
  f: (a: A) => B,
  g: (b: B) => C
): LawSet {
  return [
    {
      name: "identity",
      arity: 1,
      category: "functor",
      description: "m.map(a => a) equals m",
      check: (m: Maybe<A>): boolean => eqA.eqv(m.map((a) => a), m),
    },
    {
      name: "composition",
      arity: 1,
      category: "functor",
      description: "m.map(f).map(g) equals m.map(a => g(f(a)))",
      check: (m: Maybe<A>): boolean =>
        eqC.eqv(
          m.map(f).map(g),
          m.map((a) => g(f(a)))
        ),
    },
  ];
}
