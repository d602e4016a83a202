/**
 * Maybe Laws
 *
 * The behavioural contract of Maybe, stated over element values:
 *
 *   - definitely(a) is known; unknown() is empty
 *   - otherwise returns the value when known and the default when not
 *   - map and query apply their function only to known values
 *   - otherwiseThrow returns known values without touching its supplier and
 *     throws exactly the supplied error otherwise
 *   - a known Maybe iterates as [a], an unknown one as []
 *   - maybe(null) and maybe(undefined) are unknown
 *
 * @module
 */

import { Maybe, definitely, maybe, unknown } from "../data/maybe.js";
import { MissingValueError } from "../errors/errors.js";
import { supplier } from "../errors/suppliers.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

/**
 * Element values must not themselves be Maybes: `otherwise` would take them
 * as the alternative Maybe rather than the default value.
 *
 * @param E - equality on element values
 * @param pivot - the value the `query` laws test against
 */
export function maybeLaws<A>(E: Eq<A>, pivot: A): LawSet {
  const eqMaybe = (x: Maybe<A>, y: Maybe<A>): boolean => x.equals(y, E);

  return [
    {
      name: "known is known",
      arity: 1,
      category: "maybe",
      check: (a: A): boolean => definitely(a).isKnown() && !definitely(a).isEmpty(),
    },
    {
      name: "unknown is empty",
      arity: 0,
      category: "maybe",
      check: (): boolean => unknown<A>().isEmpty() && !unknown<A>().isKnown(),
    },
    {
      name: "otherwise on known",
      arity: 2,
      category: "maybe",
      description: "definitely(a).otherwise(d) === a",
      check: (a: A, d: A): boolean => E.eqv(definitely(a).otherwise(d), a),
    },
    {
      name: "otherwise on unknown",
      arity: 1,
      category: "maybe",
      description: "unknown().otherwise(d) === d",
      check: (d: A): boolean => E.eqv(unknown<A>().otherwise(d), d),
    },
    {
      name: "otherwise keeps a known maybe",
      arity: 2,
      category: "maybe",
      check: (a: A, d: A): boolean =>
        eqMaybe(definitely(a).otherwise(definitely(d)), definitely(a)),
    },
    {
      name: "otherwise falls back to the alternative",
      arity: 1,
      category: "maybe",
      check: (d: A): boolean => eqMaybe(unknown<A>().otherwise(definitely(d)), definitely(d)),
    },
    {
      name: "map on known",
      arity: 1,
      category: "maybe",
      description: "definitely(a).map(f) equals definitely(f(a))",
      check: (a: A): boolean =>
        definitely(a)
          .map((x) => ({ wrapped: x }))
          .fold(
            () => false,
            (r) => E.eqv(r.wrapped, a)
          ),
    },
    {
      name: "map skips unknown",
      arity: 0,
      category: "maybe",
      check: (): boolean => {
        let called = false;
        const mapped = unknown<A>().map(() => {
          called = true;
          return 0;
        });
        return mapped.isEmpty() && !called;
      },
    },
    {
      name: "query on known",
      arity: 1,
      category: "maybe",
      description: "definitely(a).query(p) equals definitely(p(a))",
      check: (a: A): boolean => {
        const isPivot = (x: A): boolean => E.eqv(x, pivot);
        return definitely(a).query(isPivot).equals(definitely(isPivot(a)));
      },
    },
    {
      name: "query skips unknown",
      arity: 0,
      category: "maybe",
      check: (): boolean => {
        let called = false;
        const queried = unknown<A>().query(() => {
          called = true;
          return true;
        });
        return queried.equals(unknown<boolean>()) && !called;
      },
    },
    {
      name: "otherwiseThrow on known",
      arity: 1,
      category: "maybe",
      description: "definitely(a).otherwiseThrow(s) === a and s.get() is never called",
      check: (a: A): boolean => {
        let called = false;
        const s = supplier(() => {
          called = true;
          return new MissingValueError();
        });
        return E.eqv(definitely(a).otherwiseThrow(s), a) && !called;
      },
    },
    {
      name: "otherwiseThrow on unknown",
      arity: 0,
      category: "maybe",
      description: "unknown().otherwiseThrow(s) throws the instance s.get() returns",
      check: (): boolean => {
        const expected = new MissingValueError("absent");
        try {
          unknown<A>().otherwiseThrow(supplier(() => expected));
        } catch (thrown) {
          return thrown === expected;
        }
        return false;
      },
    },
    {
      name: "iteration",
      arity: 1,
      category: "maybe",
      description: "[...definitely(a)] is [a] and [...unknown()] is []",
      check: (a: A): boolean => {
        const known = [...definitely(a)];
        return known.length === 1 && E.eqv(known[0], a) && [...unknown<A>()].length === 0;
      },
    },
    {
      name: "maybe collapses null and undefined",
      arity: 0,
      category: "maybe",
      check: (): boolean => maybe<A>(null).isEmpty() && maybe<A>(undefined).isEmpty(),
    },
  ];
}
