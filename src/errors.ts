/**
 * timespan-parse/errors
 *
 * Failure types for duration parsing. Uses TaggedError so a
 * `DurationParseError` can be narrowed with `switch (error._tag)`.
 *
 * @example
 * ```typescript
 * const result = parseResult('soon');
 * if (!result.ok) {
 *   switch (result.error._tag) {
 *     case 'MalformedDurationError':
 *       return `not a duration: ${result.error.input}`;
 *     case 'InvalidNumeralError':
 *       return `bad ${result.error.field} value ${result.error.numeral}`;
 *     default:
 *       return result.error.message;
 *   }
 * }
 * ```
 */

import type { FieldName } from "./grammar";
import { TaggedError } from "./tagged-error";

/**
 * The text matched no time format and is not a plain decimal numeral.
 *
 * @example
 * ```typescript
 * new MalformedDurationError({ input: 'soon' }).message;
 * // 'MalformedDurationError: "soon" is not a duration expression'
 * ```
 */
export class MalformedDurationError extends TaggedError(
  "MalformedDurationError",
  {
    message: (p: {
      /** The text that failed to parse */
      input: string;
    }) => `MalformedDurationError: "${p.input}" is not a duration expression`,
  }
) {}

/**
 * A time format matched, but a field captured text such as `1.2.3` that
 * is not a numeral.
 */
export class InvalidNumeralError extends TaggedError("InvalidNumeralError", {
  message: (p: {
    /** Field the numeral was captured for */
    field: FieldName;
    /** Captured text */
    numeral: string;
  }) => `InvalidNumeralError: "${p.numeral}" is not a valid ${p.field} value`,
}) {}

/**
 * Input was neither text nor a finite number.
 */
export class UnsupportedInputError extends TaggedError(
  "UnsupportedInputError",
  {
    message: (p: {
      /** Short description of the rejected input */
      received: string;
    }) => `UnsupportedInputError: cannot read a duration from ${p.received}`,
  }
) {}

/**
 * Something threw while parsing. The thrown value is the error's `cause`.
 */
export class UnexpectedParseError extends TaggedError("UnexpectedParseError", {
  message: (p: { reason: string }) => `UnexpectedParseError: ${p.reason}`,
}) {}

export type DurationParseError =
  | MalformedDurationError
  | InvalidNumeralError
  | UnsupportedInputError
  | UnexpectedParseError;

// =============================================================================
// Type Guards
// =============================================================================

export function isMalformedDurationError(
  error: unknown
): error is MalformedDurationError {
  return error instanceof MalformedDurationError;
}

export function isInvalidNumeralError(
  error: unknown
): error is InvalidNumeralError {
  return error instanceof InvalidNumeralError;
}

export function isUnsupportedInputError(
  error: unknown
): error is UnsupportedInputError {
  return error instanceof UnsupportedInputError;
}

export function isUnexpectedParseError(
  error: unknown
): error is UnexpectedParseError {
  return error instanceof UnexpectedParseError;
}

export function isDurationParseError(
  error: unknown
): error is DurationParseError {
  return (
    isMalformedDurationError(error) ||
    isInvalidNumeralError(error) ||
    isUnsupportedInputError(error) ||
    isUnexpectedParseError(error)
  );
}

/**
 * Describes a thrown value for `UnexpectedParseError.reason`.
 */
export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) return thrown.message;
  return typeof thrown === "string"
    ? thrown
    : `non-error value of type ${typeof thrown}`;
}
