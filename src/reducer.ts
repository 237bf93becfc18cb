import {
  FIELD_NAMES,
  MULTIPLIERS,
  type FieldName,
  type PatternName,
} from "./grammar";
import type { DurationMatch, FieldMap, FieldsMatch } from "./matcher";
import { floatValue, integerValue, type Numeral } from "./numeral";
import type { Sign } from "./sign";

/** Whether the value came out of integer or float arithmetic. */
export type ResultKind = "integer" | "float";

/**
 * Where a parsed value came from: a time format, the plain-numeral fallback,
 * or a numeric input passed straight through.
 */
export type DurationSource = PatternName | "numeral" | "number";

export interface ParsedDuration {
  /** Signed duration in seconds. */
  readonly seconds: number;
  readonly kind: ResultKind;
  readonly sign: Sign;
  readonly source: DurationSource;
  /** Fields after any minutes reinterpretation; empty unless a format matched. */
  readonly fields: FieldMap;
}

// =============================================================================
// Ambiguity resolution
// =============================================================================

/**
 * Reads a bare `H:MM` clock as hours and minutes instead of minutes and
 * seconds. Only minute-clock matches with one colon, no fraction and no
 * larger fields qualify; anything else comes back unchanged.
 *
 * `1:24` matched as { mins: 1, secs: 24 } becomes { hours: 1, mins: 24 }.
 */
export function interpretAsMinutes(match: FieldsMatch): FieldsMatch {
  const { fields, text } = match;
  if (
    match.pattern !== "minute-clock" ||
    text.split(":").length !== 2 ||
    text.includes(".") ||
    fields.hours ||
    fields.days ||
    fields.weeks
  ) {
    return match;
  }

  const reinterpreted: FieldMap = {};
  if (fields.mins) reinterpreted.hours = fields.mins;
  if (fields.secs) reinterpreted.mins = fields.secs;
  return { ...match, fields: reinterpreted };
}

// =============================================================================
// Reduction
// =============================================================================

/** Σ multiplier × value over present fields, in canonical field order. */
function weightedSum(
  fields: FieldMap,
  value: (numeral: Numeral) => number,
  skip?: FieldName
): number {
  let total = 0;
  for (const field of FIELD_NAMES) {
    const numeral = fields[field];
    if (!numeral || field === skip) continue;
    total += MULTIPLIERS[field] * value(numeral);
  }
  return total;
}

function allIntegers(fields: FieldMap): boolean {
  return FIELD_NAMES.every((field) => fields[field]?.kind !== "decimal");
}

// Integer results never report -0.
function withoutNegativeZero(value: number): number {
  return Object.is(value, -0) ? 0 : value;
}

function reduceFields(match: FieldsMatch, sign: Sign): ParsedDuration {
  const { fields } = match;
  const base = { sign, source: match.pattern, fields };

  if (allIntegers(fields)) {
    return {
      ...base,
      seconds: withoutNegativeZero(sign * weightedSum(fields, integerValue)),
      // millis carries a fractional multiplier
      kind: fields.millis ? "float" : "integer",
    };
  }

  const { secs } = fields;
  if (!secs || secs.kind === "integer") {
    // Only the non-seconds fields are fractional: their sum is truncated, and
    // the whole seconds are added without the sign.
    const whole = secs ? integerValue(secs) : 0;
    const rest = Math.trunc(weightedSum(fields, floatValue, "secs"));
    return {
      ...base,
      seconds: withoutNegativeZero(whole + sign * rest),
      kind: "integer",
    };
  }

  return {
    ...base,
    seconds: sign * weightedSum(fields, floatValue),
    kind: "float",
  };
}

/**
 * Turns a match into a signed number of seconds.
 *
 * - every numeral is an integer: exact integer sum
 * - seconds absent or whole: other fields summed as floats and truncated
 * - fractional seconds: plain float sum
 * - plain numeral fallback: truncated toward zero
 */
export function reduceMatch(match: DurationMatch, sign: Sign): ParsedDuration {
  if (match.kind === "fields") return reduceFields(match, sign);

  return {
    seconds: withoutNegativeZero(sign * Math.trunc(match.value)),
    kind: "integer",
    sign,
    source: "numeral",
    fields: {},
  };
}
