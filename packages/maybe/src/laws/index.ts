export { combineLaws, defineLaw, filterLaws, type Law, type LawSet } from "./types.js";
export {
  arbitraryInteger,
  arbitraryMaybe,
  arbitraryString,
  constant,
  oneOf,
  scramble,
  type Arbitrary,
} from "./arbitrary.js";
export { eqLaws, ordLaws } from "./eq.js";
export { functorLaws } from "./functor.js";
export { maybeLaws } from "./maybe.js";
export {
  assertLaws,
  checkLaw,
  checkLaws,
  defaultIterations,
  type CheckOptions,
  type LawCheckResult,
} from "./verify.js";
