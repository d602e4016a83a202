export {
  EQ,
  GT,
  LT,
  eqBoolean,
  eqBy,
  eqNumber,
  eqStrict,
  eqString,
  fromComparator,
  gt,
  lt,
  makeEq,
  makeOrd,
  max,
  min,
  neqv,
  ordBoolean,
  ordBy,
  ordNumber,
  ordString,
  type Eq,
  type Ord,
  type Ordering,
} from "./eq.js";

export {
  display,
  showArray,
  showBoolean,
  showNumber,
  showString,
  type Show,
} from "./show.js";
