/**
 * Maybe Data Type
 *
 * A Maybe<A> represents a possibly non-existent value of type A, replacing
 * `null`/`undefined` sentinels. It is either known (holds a value) or unknown
 * (holds nothing); the value cannot be used without deciding what happens
 * when it is missing.
 *
 * Unlike a bare `A | null`, a known Maybe may hold `null` itself:
 *
 * ```typescript
 * definitely(null).isKnown()  // true
 * maybe(null).isKnown()       // false
 * ```
 *
 * @example
 * ```typescript
 * const port = maybe(process.env.PORT)
 *   .map(Number)
 *   .otherwise(8080);
 *
 * const user = lookupUser(id).otherwiseThrow(illegalArgument(`no user ${id}`));
 *
 * for (const name of maybe(nickname)) greet(name);
 * ```
 */

import { unreachable } from "@knowable/core";
import type { Eq, Ord, Ordering } from "../typeclasses/eq.js";
import { display, type Show } from "../typeclasses/show.js";
import { ErrorConstructionError } from "../errors/errors.js";
import {
  construct,
  isErrorSupplier,
  type ErrorKind,
  type ErrorSupplier,
  type MessageErrorKind,
} from "../errors/suppliers.js";

// ============================================================================
// Internal Representation
// ============================================================================

type MaybeState<A> =
  | { readonly _tag: "Known"; readonly value: A }
  | { readonly _tag: "Unknown" };

const UNKNOWN: MaybeState<never> = { _tag: "Unknown" };
const UNKNOWN_STATE = Object.freeze(UNKNOWN);

/**
 * A value with its own notion of equality, such as a nested Maybe.
 */
interface Equatable {
  equals(other: unknown): boolean;
}

function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

/**
 * Element equality used when `equals` is called without an Eq: the value's
 * own `equals` method if it has one, `Object.is` otherwise.
 */
function defaultEquals(x: unknown, y: unknown): boolean {
  return isEquatable(x) ? x.equals(y) : Object.is(x, y);
}

// ============================================================================
// Maybe
// ============================================================================

export class Maybe<A> implements Iterable<A> {
  private constructor(private readonly state: MaybeState<A>) {}

  // --------------------------------------------------------------------------
  // Constructors
  // --------------------------------------------------------------------------

  /**
   * Wrap a value known to exist. `null` and `undefined` are wrapped as-is.
   */
  static definitely<A>(value: A): Maybe<A> {
    const state: MaybeState<A> = { _tag: "Known", value };
    return new Maybe<A>(Object.freeze(state));
  }

  /**
   * The absent value (replaces null).
   */
  static unknown<A = never>(): Maybe<A> {
    return new Maybe<A>(UNKNOWN_STATE);
  }

  /**
   * Synonym of {@link Maybe.unknown}.
   */
  static nothing<A = never>(): Maybe<A> {
    return Maybe.unknown<A>();
  }

  /**
   * Unknown for `null` or `undefined`, known otherwise.
   */
  static maybe<A>(value: A | null | undefined): Maybe<A> {
    return value === null || value === undefined ? Maybe.unknown<A>() : Maybe.definitely(value);
  }

  /**
   * Known when the predicate holds for the value, unknown otherwise.
   */
  static fromPredicate<A>(value: A, predicate: (a: A) => boolean): Maybe<A> {
    return predicate(value) ? Maybe.definitely(value) : Maybe.unknown<A>();
  }

  static isMaybe(value: unknown): value is Maybe<unknown> {
    return value instanceof Maybe;
  }

  // --------------------------------------------------------------------------
  // Inspection
  // --------------------------------------------------------------------------

  isKnown(): boolean {
    return this.state._tag === "Known";
  }

  isEmpty(): boolean {
    return !this.isKnown();
  }

  /**
   * Case analysis: `onKnown(value)` if known, `onUnknown()` otherwise.
   */
  fold<B>(onUnknown: () => B, onKnown: (a: A) => B): B {
    const state = this.state;
    switch (state._tag) {
      case "Known":
        return onKnown(state.value);
      case "Unknown":
        return onUnknown();
      default:
        return unreachable(state);
    }
  }

  // --------------------------------------------------------------------------
  // Defaults
  // --------------------------------------------------------------------------

  /**
   * This Maybe if known, otherwise the given alternative. Lets fallback
   * sources be chained: `fromFlag.otherwise(fromEnv).otherwise(fromFile)`.
   */
  otherwise<B>(defaultMaybe: Maybe<B>): Maybe<A | B>;
  /**
   * The wrapped value if known, otherwise the given value.
   */
  otherwise<B>(defaultValue: B): A | B;
  otherwise<B>(defaultValue: B | Maybe<B>): A | B | Maybe<A | B> {
    const state = this.state;
    if (defaultValue instanceof Maybe) {
      return state._tag === "Known" ? this : defaultValue;
    }
    return state._tag === "Known" ? state.value : defaultValue;
  }

  /**
   * The value-default overload of `otherwise`, for element types that are
   * themselves Maybes.
   */
  otherwiseValue(defaultValue: A): A {
    return this.fold(
      () => defaultValue,
      (a) => a
    );
  }

  /**
   * The value if known, otherwise `compute()`. `compute` is not called when
   * the value is known.
   */
  otherwiseGet(compute: () => A): A {
    return this.fold(compute, (a) => a);
  }

  /**
   * The Maybe-default overload of `otherwise` under an unambiguous name.
   */
  orElse<B>(alternative: Maybe<B>): Maybe<A | B> {
    return this.isKnown() ? this : alternative;
  }

  /**
   * The wrapped value, or throw the supplier's error when unknown.
   * The supplier is not touched when the value is known.
   */
  otherwiseThrow<E extends Error>(supplier: ErrorSupplier<E>): A;
  /**
   * The wrapped value, or throw `new kind()` when unknown.
   */
  otherwiseThrow<E extends Error>(kind: ErrorKind<E>): A;
  /**
   * The wrapped value, or throw `new kind(message)` when unknown.
   */
  otherwiseThrow<E extends Error>(kind: MessageErrorKind<E>, message: string): A;
  otherwiseThrow<E extends Error>(
    source: ErrorSupplier<E> | ErrorKind<E> | MessageErrorKind<E>,
    message?: string
  ): A {
    const state = this.state;
    if (state._tag === "Known") return state.value;
    throw errorFrom(source, message);
  }

  // --------------------------------------------------------------------------
  // Transformations
  // --------------------------------------------------------------------------

  /**
   * Apply `f` to the value if known. `f` is never called on an unknown
   * Maybe, so it may assume the value exists.
   */
  map<B>(f: (a: A) => B): Maybe<B> {
    return this.fold(
      () => Maybe.unknown<B>(),
      (a) => Maybe.definitely(f(a))
    );
  }

  /**
   * Alias of {@link Maybe.map}.
   */
  to<B>(f: (a: A) => B): Maybe<B> {
    return this.map(f);
  }

  /**
   * Test the value if known. Unknown stays unknown, so "nothing to test" is
   * distinguishable from "tested false".
   */
  query(predicate: (a: A) => boolean): Maybe<boolean> {
    return this.fold(
      () => Maybe.unknown<boolean>(),
      (a) => Maybe.definitely(predicate(a))
    );
  }

  // --------------------------------------------------------------------------
  // Iteration & Conversion
  // --------------------------------------------------------------------------

  *[Symbol.iterator](): Iterator<A> {
    const state = this.state;
    if (state._tag === "Known") yield state.value;
  }

  toArray(): A[] {
    return [...this];
  }

  // --------------------------------------------------------------------------
  // Equality & Display
  // --------------------------------------------------------------------------

  /**
   * Two known values are equal when their values are; two unknowns are
   * equal; known and unknown never are.
   *
   * Without `eq`, values are compared with their own `equals` method when
   * they have one, and `Object.is` otherwise.
   */
  equals(other: Maybe<A>, eq?: Eq<A>): boolean {
    if (!(other instanceof Maybe)) return false;
    const x = this.state;
    const y = other.state;
    if (x._tag === "Known" && y._tag === "Known") {
      return eq ? eq.eqv(x.value, y.value) : defaultEquals(x.value, y.value);
    }
    return x._tag === y._tag;
  }

  toString(): string {
    return this.fold(
      () => "unknown",
      (a) => `definitely ${display(a)}`
    );
  }
}

type ErrorSource<E extends Error> = ErrorSupplier<E> | ErrorKind<E> | MessageErrorKind<E>;

function isErrorKind<E extends Error>(
  source: ErrorSource<E>
): source is ErrorKind<E> | MessageErrorKind<E> {
  return typeof source === "function";
}

function errorFrom<E extends Error>(source: ErrorSource<E>, message: string | undefined): E {
  if (isErrorKind(source)) {
    const kind: new (...args: string[]) => E = source;
    return message === undefined ? construct<E>(kind) : construct<E>(kind, message);
  }
  if (isErrorSupplier(source)) return source.get();
  throw new ErrorConstructionError(
    display(source),
    new TypeError("expected an error supplier or error class")
  );
}

// ============================================================================
// Constructors
// ============================================================================

export function definitely<A>(value: A): Maybe<A> {
  return Maybe.definitely(value);
}

export function unknown<A = never>(): Maybe<A> {
  return Maybe.unknown<A>();
}

export function nothing<A = never>(): Maybe<A> {
  return Maybe.nothing<A>();
}

/**
 * Wrap a possibly-absent value: `null` and `undefined` become unknown.
 */
export function maybe<A>(value: A | null | undefined): Maybe<A> {
  return Maybe.maybe(value);
}

export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Maybe<A> {
  return Maybe.fromPredicate(value, predicate);
}

export function isMaybe(value: unknown): value is Maybe<unknown> {
  return Maybe.isMaybe(value);
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Maybe: unknowns are equal to each other, known values
 * compare with `E`.
 */
export function getEq<A>(E: Eq<A>): Eq<Maybe<A>> {
  return {
    eqv: (x, y) => x.equals(y, E),
  };
}

/**
 * Ord instance for Maybe (Unknown < Known).
 */
export function getOrd<A>(O: Ord<A>): Ord<Maybe<A>> {
  const compare = (x: Maybe<A>, y: Maybe<A>): Ordering =>
    x.fold<Ordering>(
      () => (y.isKnown() ? -1 : 0),
      (a) =>
        y.fold<Ordering>(
          () => 1,
          (b) => O.compare(a, b)
        )
    );
  return {
    eqv: getEq(O).eqv,
    compare,
  };
}

/**
 * Show instance for Maybe: `unknown` or `definitely <shown value>`.
 */
export function getShow<A>(S: Show<A>): Show<Maybe<A>> {
  return {
    show: (m) =>
      m.fold(
        () => "unknown",
        (a) => `definitely ${S.show(a)}`
      ),
  };
}
