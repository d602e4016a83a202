/**
 * Law Definition Types
 *
 * A law is a predicate that must hold for every input. Law sets are plain
 * data, checked at run time by `verify.ts` against generated inputs.
 *
 * @example
 * ```typescript
 * const identity = defineLaw({
 *   name: "map identity",
 *   arity: 1,
 *   check: (m: Maybe<number>) => m.map((a) => a).equals(m),
 * });
 * ```
 *
 * @module
 */

/**
 * A law definition.
 *
 * @template Args - Tuple type of the law's input arguments
 */
export interface Law<Args extends unknown[] = unknown[]> {
  /**
   * Human-readable name, used in failure messages.
   */
  readonly name: string;

  /**
   * Number of generated values the law needs.
   */
  readonly arity: number;

  /**
   * Returns true if the law holds for the given inputs.
   */
  check(...args: Args): boolean;

  readonly description?: string;

  /**
   * Grouping key, e.g. "eq", "functor", "maybe".
   */
  readonly category?: string;
}

export type LawSet = readonly Law[];

/**
 * Create a law with type inference for the check function.
 */
export function defineLaw<Args extends unknown[]>(law: Law<Args>): Law<Args> {
  return law;
}

export function combineLaws(...lawSets: LawSet[]): LawSet {
  return lawSets.flat();
}

export function filterLaws(laws: LawSet, category: string): LawSet {
  return laws.filter((law) => law.category === category);
}
