/**
 * Eq and Ord Laws
 *
 * Eq:
 *   - Reflexivity: eqv(x, x)
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *
 * Ord (extends Eq):
 *   - Antisymmetry: compare(x, y) <= 0 && compare(y, x) <= 0 => eqv(x, y)
 *   - Transitivity: compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0
 *   - Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 *   - Consistency: eqv(x, y) === (compare(x, y) === 0)
 *
 * @module
 */

import type { Eq, Ord } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

const implies = (premise: boolean, conclusion: () => boolean): boolean =>
  !premise || conclusion();

export function eqLaws<A>(E: Eq<A>): LawSet {
  return [
    {
      name: "reflexivity",
      arity: 1,
      category: "eq",
      description: "eqv(x, x)",
      check: (x: A): boolean => E.eqv(x, x),
    },
    {
      name: "symmetry",
      arity: 2,
      category: "eq",
      description: "eqv(x, y) === eqv(y, x)",
      check: (x: A, y: A): boolean => E.eqv(x, y) === E.eqv(y, x),
    },
    {
      name: "transitivity",
      arity: 3,
      category: "eq",
      description: "eqv(x, y) && eqv(y, z) implies eqv(x, z)",
      check: (x: A, y: A, z: A): boolean =>
        implies(E.eqv(x, y) && E.eqv(y, z), () => E.eqv(x, z)),
    },
  ];
}

/**
 * The Eq laws plus the ordering laws.
 */
export function ordLaws<A>(O: Ord<A>): LawSet {
  return [
    ...eqLaws(O),
    {
      name: "antisymmetry",
      arity: 2,
      category: "ord",
      description: "compare(x, y) <= 0 && compare(y, x) <= 0 implies eqv(x, y)",
      check: (x: A, y: A): boolean =>
        implies(O.compare(x, y) <= 0 && O.compare(y, x) <= 0, () => O.eqv(x, y)),
    },
    {
      name: "transitivity (ordering)",
      arity: 3,
      category: "ord",
      description: "compare(x, y) <= 0 && compare(y, z) <= 0 implies compare(x, z) <= 0",
      check: (x: A, y: A, z: A): boolean =>
        implies(O.compare(x, y) <= 0 && O.compare(y, z) <= 0, () => O.compare(x, z) <= 0),
    },
    {
      name: "totality",
      arity: 2,
      category: "ord",
      description: "compare(x, y) <= 0 || compare(y, x) <= 0",
      check: (x: A, y: A): boolean => O.compare(x, y) <= 0 || O.compare(y, x) <= 0,
    },
    {
      name: "consistency",
      arity: 2,
      category: "ord",
      description: "eqv(x, y) === (compare(x, y) === 0)",
      check: (x: A, y: A): boolean => O.eqv(x, y) === (O.compare(x, y) === 0),
    },
  ];
}
