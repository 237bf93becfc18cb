/**
 * timespan-parse
 *
 * Reads human-written duration expressions ("1:24", "1.2 minutes",
 * "-1d2h3m", "1:22:33.5") as a signed number of seconds.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { parse, parseResult } from 'timespan-parse';
 *
 * parse('1 minute, 24 secs');    // 84
 * parse('1:24', 'minutes');      // 5040
 * parse('later');                // undefined
 *
 * const result = parseResult('1.2.3 hours');
 * if (!result.ok) console.error(result.error.message);
 * ```
 *
 * ## Entry Points
 *
 * - `timespan-parse` - Timespan namespace, parsing operations, grammar, errors
 * - `timespan-parse/result` - Result types only
 * - `timespan-parse/errors` - Error classes, guards and TaggedError
 */

import * as result from "./result";
import { parse, parseResult, parseDetailed, createParser } from "./parse";
import { TaggedError, isTaggedError } from "./tagged-error";

// =============================================================================
// Timespan namespace
// =============================================================================

const Timespan = {
  parse,
  parseResult,
  parseDetailed,
  createParser,
  // Result (all value exports)
  ...result,
  // Tagged errors
  TaggedError,
  isTaggedError,
} as const;

export { Timespan };

// =============================================================================
// Named value exports
// =============================================================================

export {
  parse,
  parseResult,
  parseDetailed,
  createParser,
  DEFAULT_GRANULARITY,
} from "./parse";

export {
  FIELD_NAMES,
  MULTIPLIERS,
  UNIT_SUFFIXES,
  TIME_FORMATS,
} from "./grammar";

export { extractSign } from "./sign";
export { matchDuration, matchFormat } from "./matcher";
export { interpretAsMinutes, reduceMatch } from "./reducer";
export { readNumeral, readDecimalLiteral } from "./numeral";

export {
  MalformedDurationError,
  InvalidNumeralError,
  UnsupportedInputError,
  UnexpectedParseError,
  isMalformedDurationError,
  isInvalidNumeralError,
  isUnsupportedInputError,
  isUnexpectedParseError,
  isDurationParseError,
} from "./errors";

export {
  ok,
  err,
  isOk,
  isErr,
  map,
  mapError,
  andThen,
  match,
  unwrapOr,
  from,
} from "./result";

export { TaggedError, isTaggedError } from "./tagged-error";

// =============================================================================
// Type exports
// =============================================================================

export type {
  Granularity,
  DurationInput,
  DurationEvent,
  ParseOptions,
  DurationParser,
} from "./parse";
export type { FieldName, PatternName, TimeFormat } from "./grammar";
export type { Sign, SignedText } from "./sign";
export type {
  FieldMap,
  FieldsMatch,
  NumeralMatch,
  DurationMatch,
} from "./matcher";
export type { ParsedDuration, ResultKind, DurationSource } from "./reducer";
export type { Numeral, NumeralKind } from "./numeral";
export type { DurationParseError } from "./errors";
export type { Ok, Err, Result } from "./result";
export type {
  TaggedErrorBase,
  TaggedErrorOptions,
  TaggedErrorCreateOptions,
  TaggedErrorConstructor,
  TaggedErrorClass,
  TaggedErrorInstance,
  TagOf,
  ErrorByTag,
  PropsOf,
} from "./tagged-error";
