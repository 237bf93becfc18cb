/**
 * timespan-parse/errors entry point
 *
 * Parse failure classes, their guards, and the TaggedError factory they are
 * built on.
 */
export {
  // Error classes
  MalformedDurationError,
  InvalidNumeralError,
  UnsupportedInputError,
  UnexpectedParseError,
  // Union type
  type DurationParseError,
  // Type guards
  isMalformedDurationError,
  isInvalidNumeralError,
  isUnsupportedInputError,
  isUnexpectedParseError,
  isDurationParseError,
} from "./errors";

export {
  TaggedError,
  isTaggedError,
  type TaggedErrorBase,
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";
