export {
  IllegalArgumentError,
  IllegalStateError,
  MissingValueError,
  ErrorConstructionError,
  LawViolationError,
} from "./errors.js";

export {
  construct,
  exception,
  illegalArgument,
  illegalState,
  isErrorSupplier,
  missingValue,
  supplier,
  type ErrorKind,
  type ErrorSupplier,
  type MessageErrorKind,
} from "./suppliers.js";
