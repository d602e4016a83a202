export {
  Maybe,
  definitely,
  fromPredicate,
  getEq,
  getOrd,
  getShow,
  isMaybe,
  maybe,
  nothing,
  unknown,
} from "./maybe.js";
