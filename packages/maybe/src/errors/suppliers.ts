/**
 * Error Suppliers
 *
 * Deferred error factories for `Maybe.otherwiseThrow`. A supplier builds its
 * error only when `get()` is called, so nothing is allocated when the Maybe
 * holds a value.
 *
 * @example
 * ```typescript
 * const name = maybeUsername.otherwiseThrow(illegalArgument("missing username"));
 * ```
 */

import { createLogger } from "@knowable/core";
import {
  ErrorConstructionError,
  IllegalArgumentError,
  IllegalStateError,
  MissingValueError,
} from "./errors.js";
import { display } from "../typeclasses/show.js";

const log = createLogger("suppliers");

// ============================================================================
// Types
// ============================================================================

/**
 * Zero-argument capability producing an error. Each `get()` builds a new
 * instance.
 */
export interface ErrorSupplier<E extends Error> {
  get(): E;
}

/**
 * An error class constructible without arguments.
 */
export type ErrorKind<E extends Error> = new () => E;

/**
 * An error class constructible from a message.
 */
export type MessageErrorKind<E extends Error> = new (message: string) => E;

// ============================================================================
// Construction
// ============================================================================

function kindName(kind: unknown): string {
  if (typeof kind === "function" && kind.name !== "") return kind.name;
  return typeof kind === "function" ? "<anonymous>" : display(kind);
}

/**
 * Build an error from its class, through the no-argument constructor or the
 * message constructor.
 *
 * @throws ErrorConstructionError if `kind` is not a constructor or its
 *   constructor throws
 */
export function construct<E extends Error>(kind: ErrorKind<E>): E;
export function construct<E extends Error>(kind: MessageErrorKind<E>, message: string): E;
export function construct<E extends Error>(
  kind: ErrorKind<E> | MessageErrorKind<E>,
  message?: string
): E {
  if (typeof kind !== "function") {
    throw new ErrorConstructionError(
      kindName(kind),
      new TypeError("error kind is not a constructor")
    );
  }

  const create: new (...args: string[]) => E = kind;
  try {
    return message === undefined ? new create() : new create(message);
  } catch (cause) {
    log.debug(`constructing ${kindName(kind)} failed`, cause);
    throw new ErrorConstructionError(kindName(kind), cause);
  }
}

/**
 * Adapt a closure into a supplier.
 */
export function supplier<E extends Error>(create: () => E): ErrorSupplier<E> {
  return { get: create };
}

/**
 * Runtime guard for suppliers.
 */
export function isErrorSupplier(value: unknown): value is ErrorSupplier<Error> {
  return (
    typeof value === "object" &&
    value !== null &&
    "get" in value &&
    typeof value.get === "function"
  );
}

// ============================================================================
// Parameterless Singletons
// ============================================================================

const illegalArgumentSupplier: ErrorSupplier<IllegalArgumentError> = Object.freeze({
  get: () => new IllegalArgumentError(),
});

const illegalStateSupplier: ErrorSupplier<IllegalStateError> = Object.freeze({
  get: () => new IllegalStateError(),
});

const missingValueSupplier: ErrorSupplier<MissingValueError> = Object.freeze({
  get: () => new MissingValueError(),
});

// ============================================================================
// Factories
// ============================================================================

/**
 * Supplier of IllegalArgumentError. Without a message the shared singleton is
 * returned; with one, the message is captured now and used on every `get()`.
 */
export function illegalArgument(message?: string): ErrorSupplier<IllegalArgumentError> {
  if (message === undefined) return illegalArgumentSupplier;
  return { get: () => new IllegalArgumentError(message) };
}

/**
 * Supplier of IllegalStateError.
 */
export function illegalState(message?: string): ErrorSupplier<IllegalStateError> {
  if (message === undefined) return illegalStateSupplier;
  return { get: () => new IllegalStateError(message) };
}

/**
 * Supplier of MissingValueError.
 */
export function missingValue(message?: string): ErrorSupplier<MissingValueError> {
  if (message === undefined) return missingValueSupplier;
  return { get: () => new MissingValueError(message) };
}

/**
 * Supplier of any error class, built through its no-argument constructor or,
 * when a message is given, its message constructor. Construction failures
 * surface from `get()` as ErrorConstructionError.
 *
 * @example
 * ```typescript
 * class NotFound extends Error {}
 * const notFound = exception(NotFound, "no such user");
 * user.otherwiseThrow(notFound);
 * ```
 */
export function exception<E extends Error>(kind: ErrorKind<E>): ErrorSupplier<E>;
export function exception<E extends Error>(
  kind: MessageErrorKind<E>,
  message: string
): ErrorSupplier<E>;
export function exception<E extends Error>(
  kind: ErrorKind<E> | MessageErrorKind<E>,
  message?: string
): ErrorSupplier<E> {
  const create: new (...args: string[]) => E = kind;
  return {
    get: () => (message === undefined ? construct<E>(create) : construct<E>(create, message)),
  };
}
