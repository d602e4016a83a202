/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` asserts a condition
 * - `unreachable(value)` marks impossible code paths
 *
 * @example
 * ```typescript
 * type Tagged = { _tag: "Known" } | { _tag: "Unknown" };
 * function label(t: Tagged): string {
 *   switch (t._tag) {
 *     case "Known": return "known";
 *     case "Unknown": return "unknown";
 *     default: return unreachable(t); // Type error if Tagged is extended
 *   }
 * }
 * ```
 */

/**
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Exhaustiveness marker. Throws if somehow reached.
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${String(value)}`);
}
