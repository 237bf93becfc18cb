import { MalformedDurationError, type InvalidNumeralError } from "./errors";
import {
  TIME_FORMATS,
  type FieldName,
  type PatternName,
  type TimeFormat,
} from "./grammar";
import { readDecimalLiteral, readNumeral, type Numeral } from "./numeral";
import { err, ok, type Result } from "./result";

export type FieldMap = Partial<Record<FieldName, Numeral>>;

/** A time format matched; fields hold the captured numerals. */
export interface FieldsMatch {
  readonly kind: "fields";
  readonly pattern: PatternName;
  readonly fields: FieldMap;
  /** The trimmed text the format matched. */
  readonly text: string;
}

/** No format matched; the text read as a plain decimal literal. */
export interface NumeralMatch {
  readonly kind: "numeral";
  readonly text: string;
  readonly value: number;
}

export type DurationMatch = FieldsMatch | NumeralMatch;

/**
 * Runs one time format against trimmed text. `undefined` means the format
 * does not cover the whole text (or matched nothing).
 */
export function matchFormat(
  format: TimeFormat,
  text: string
): Result<FieldsMatch, InvalidNumeralError> | undefined {
  const match = format.regex.exec(text);
  if (!match || match[0].trim() === "") return undefined;

  const fields: FieldMap = {};
  for (const field of format.fields) {
    const raw = match.groups?.[field];
    if (raw === undefined || raw === "") continue;
    const numeral = readNumeral(raw, field);
    if (!numeral.ok) return numeral;
    fields[field] = numeral.value;
  }
  const matched: FieldsMatch = {
    kind: "fields",
    pattern: format.name,
    fields,
    text,
  };
  return ok(matched);
}

/**
 * Matches unsigned duration text against the time formats in order, then
 * falls back to a plain decimal literal.
 *
 * The first format that matches wins even if one of its numerals is invalid;
 * later formats are not consulted.
 */
export function matchDuration(
  unsigned: string
): Result<DurationMatch, MalformedDurationError | InvalidNumeralError> {
  const text = unsigned.trim();

  for (const format of TIME_FORMATS) {
    const matched = matchFormat(format, text);
    if (matched) return matched;
  }

  const value = readDecimalLiteral(text);
  if (value === undefined) {
    return err(new MalformedDurationError({ input: unsigned }));
  }
  const fallback: NumeralMatch = { kind: "numeral", text, value };
  return ok(fallback);
}
