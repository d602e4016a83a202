/**
 * @knowable/maybe
 *
 * An explicit optional value type with deferred error suppliers.
 *
 * @example
 * ```typescript
 * import { maybe, illegalArgument } from "@knowable/maybe";
 *
 * const name = maybe(form.get("name"))
 *   .map((s) => s.trim())
 *   .otherwiseThrow(illegalArgument("name is required"));
 * ```
 */

export * from "./data/index.js";
export * from "./errors/index.js";
export * from "./typeclasses/index.js";
export * from "./laws/index.js";
