/**
 * Error Types
 *
 * Error kinds raised when a Maybe turns out to be empty, plus the internal
 * errors reported when the library itself cannot do what was asked.
 */

import { display } from "../typeclasses/show.js";

/**
 * An argument was missing or invalid.
 */
export class IllegalArgumentError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "IllegalArgumentError";
  }
}

/**
 * An operation was attempted in a state that does not allow it.
 */
export class IllegalStateError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "IllegalStateError";
  }
}

/**
 * A value that was required is not there.
 */
export class MissingValueError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "MissingValueError";
  }
}

/**
 * Thrown when the error requested for an empty Maybe could not be built.
 *
 * This is never the error the caller asked for: `kind` names the error kind
 * that failed and `cause` carries the underlying failure.
 */
export class ErrorConstructionError extends Error {
  constructor(
    readonly kind: string,
    cause: unknown
  ) {
    super(`Could not construct error of kind ${kind}: ${describeCause(cause)}`, { cause });
    this.name = "ErrorConstructionError";
  }
}

/**
 * Thrown by `assertLaws` for the first law that does not hold.
 */
export class LawViolationError extends Error {
  constructor(
    readonly law: string,
    readonly counterexample: readonly string[],
    cause?: unknown
  ) {
    super(
      `Law "${law}" failed for (${counterexample.join(", ")})` +
        (cause === undefined ? "" : `: ${describeCause(cause)}`),
      { cause }
    );
    this.name = "LawViolationError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : display(cause);
}
