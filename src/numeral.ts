import { InvalidNumeralError } from "./errors";
import type { FieldName } from "./grammar";
import { err, ok, type Result } from "./result";

export type NumeralKind = "integer" | "decimal";

/**
 * Text captured for one field, classified once so the reducer can pick
 * integer or float arithmetic without rescanning it.
 */
export interface Numeral {
  readonly raw: string;
  readonly kind: NumeralKind;
}

// ASCII digits only, like the capture groups in grammar.ts.
const INTEGER_NUMERAL = /^\d+$/;
const DECIMAL_NUMERAL = /^(?:\d+\.\d*|\.\d+)$/;

export function readNumeral(
  raw: string,
  field: FieldName
): Result<Numeral, InvalidNumeralError> {
  if (INTEGER_NUMERAL.test(raw)) return ok({ raw, kind: "integer" });
  if (DECIMAL_NUMERAL.test(raw)) return ok({ raw, kind: "decimal" });
  return err(new InvalidNumeralError({ field, numeral: raw }));
}

export function integerValue(numeral: Numeral): number {
  return Number.parseInt(numeral.raw, 10);
}

export function floatValue(numeral: Numeral): number {
  return Number(numeral.raw);
}

// Sign, digits with single underscores between them, fraction, exponent.
const DIGITS = String.raw`\d(?:_?\d)*`;
const DECIMAL_LITERAL = new RegExp(
  String.raw`^[+-]?(?:${DIGITS}(?:\.(?:${DIGITS})?)?|\.${DIGITS})(?:e[+-]?${DIGITS})?$`,
  "i"
);

/**
 * Reads text that matched no time format as a plain decimal literal
 * (`"30"`, `"-3.9"`, `"1e3"`, `"1_000"`). Returns `undefined` for anything
 * else, including infinities and NaN.
 */
export function readDecimalLiteral(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) return undefined;
  const value = Number(trimmed.replaceAll("_", ""));
  return Number.isFinite(value) ? value : undefined;
}
