/**
 * Eq and Ord Typeclasses
 *
 * Eq: Equality comparison
 * Ord: Total ordering
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Ord Antisymmetry: compare(x, y) <= 0 && compare(y, x) <= 0 => eqv(x, y)
 *   - Ord Transitivity: compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0
 *   - Ord Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 *
 * See `../laws/eq.ts` for these laws as checkable values.
 */

// ============================================================================
// Ordering
// ============================================================================

export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

// ============================================================================
// Typeclasses
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/**
 * Ord typeclass - total ordering consistent with its Eq.
 */
export interface Ord<A> extends Eq<A> {
  readonly compare: (x: A, y: A) => Ordering;
}

// ============================================================================
// Constructors
// ============================================================================

export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}

/**
 * Build an Ord from a compare function; equality is `compare(x, y) === EQ`.
 */
export function makeOrd<A>(compare: (x: A, y: A) => Ordering): Ord<A> {
  return {
    eqv: (x, y) => compare(x, y) === EQ,
    compare,
  };
}

/**
 * Build an Ord from a JavaScript-style comparator returning any number.
 */
export function fromComparator<A>(comparator: (x: A, y: A) => number): Ord<A> {
  return makeOrd((x, y) => {
    const n = comparator(x, y);
    return n < 0 ? LT : n > 0 ? GT : EQ;
  });
}

/**
 * Eq that uses `===`.
 */
export function eqStrict<A>(): Eq<A> {
  return makeEq((x, y) => x === y);
}

/**
 * Eq by mapping to a comparable value.
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return makeEq((x, y) => E.eqv(f(x), f(y)));
}

/**
 * Ord by mapping to a comparable value.
 */
export function ordBy<A, B>(O: Ord<B>, f: (a: A) => B): Ord<A> {
  return makeOrd((x, y) => O.compare(f(x), f(y)));
}

// ============================================================================
// Instances
// ============================================================================

export const eqString: Eq<string> = eqStrict();
export const eqBoolean: Eq<boolean> = eqStrict();

/**
 * Eq for numbers. Uses `Object.is`, so NaN equals NaN and keeps reflexivity.
 */
export const eqNumber: Eq<number> = makeEq((x, y) => x === y || Object.is(x, y));

export const ordString: Ord<string> = fromComparator((x, y) => (x < y ? -1 : x > y ? 1 : 0));

/**
 * Ord for numbers. NaN sorts before every other number.
 */
export const ordNumber: Ord<number> = makeOrd((x, y) => {
  if (Number.isNaN(x)) return Number.isNaN(y) ? EQ : LT;
  if (Number.isNaN(y)) return GT;
  return x < y ? LT : x > y ? GT : EQ;
});

export const ordBoolean: Ord<boolean> = ordBy(ordNumber, (b: boolean) => (b ? 1 : 0));

// ============================================================================
// Derived Operations
// ============================================================================

export function neqv<A>(E: Eq<A>): (x: A, y: A) => boolean {
  return (x, y) => !E.eqv(x, y);
}

export function lt<A>(O: Ord<A>): (x: A, y: A) => boolean {
  return (x, y) => O.compare(x, y) === LT;
}

export function gt<A>(O: Ord<A>): (x: A, y: A) => boolean {
  return (x, y) => O.compare(x, y) === GT;
}

export function min<A>(O: Ord<A>): (x: A, y: A) => A {
  return (x, y) => (O.compare(x, y) <= 0 ? x : y);
}

export function max<A>(O: Ord<A>): (x: A, y: A) => A {
  return (x, y) => (O.compare(x, y) >= 0 ? x : y);
}
