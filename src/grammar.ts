/**
 * timespan-parse/grammar
 *
 * The fixed duration grammar: field names, the seconds-per-unit table, unit
 * spellings and the five time formats in the order they are tried.
 *
 * The tables, their inner lists and the format records are built once at
 * import and frozen. The compiled regular expressions themselves are not
 * frozen; they carry no `g` or `y` flag, so matching never mutates them.
 */

// =============================================================================
// Fields
// =============================================================================

export const FIELD_NAMES = Object.freeze([
  "weeks",
  "days",
  "hours",
  "mins",
  "secs",
  "millis",
] as const);

export type FieldName = (typeof FIELD_NAMES)[number];

/** Seconds represented by one unit of each field. */
export const MULTIPLIERS: Readonly<Record<FieldName, number>> = Object.freeze({
  weeks: 60 * 60 * 24 * 7,
  days: 60 * 60 * 24,
  hours: 60 * 60,
  mins: 60,
  secs: 1,
  millis: 1e-3,
});

/**
 * Unit spellings accepted after a word-form numeral, as regex fragments.
 * Alternatives are tried left to right; a short form that leaves trailing
 * letters unmatched backtracks into the longer ones.
 */
export const UNIT_SUFFIXES: Readonly<Record<FieldName, readonly string[]>> =
  Object.freeze({
    weeks: Object.freeze(["w", "wks?", "weeks?"]),
    days: Object.freeze(["d", "dys?", "days?"]),
    hours: Object.freeze(["h", "hrs?", "hours?"]),
    mins: Object.freeze(["m", "mins?", "minutes?"]),
    secs: Object.freeze(["s", "secs?", "seconds?"]),
    millis: Object.freeze(["ms", "msecs?", "millis", "milliseconds?"]),
  });

// =============================================================================
// Pattern fragments
// =============================================================================

const SEPARATORS = "[,/]";

const CLOCK_SECONDS = String.raw`\d{2}(?:\.\d+)?`;

/** `1.5 hours`, `3h`: a captured numeral followed by a unit spelling. */
function word(field: FieldName): string {
  return String.raw`(?<${field}>[\d.]+)\s*(?:${UNIT_SUFFIXES[field].join("|")})`;
}

/** An optional word field that may be followed by `,` or `/`. */
function optionalWithSeparator(field: FieldName): string {
  return String.raw`(?:${word(field)}\s*(?:${SEPARATORS}\s*)?)?`;
}

const COMPOUND = [
  optionalWithSeparator("weeks"),
  optionalWithSeparator("days"),
  optionalWithSeparator("hours"),
  optionalWithSeparator("mins"),
  String.raw`(?:${word("secs")}\s*)?`,
  `(?:${word("millis")})?`,
].join("");

const MINUTE_CLOCK = String.raw`(?<mins>\d{1,2}):(?<secs>${CLOCK_SECONDS})`;

const HOUR_CLOCK = [
  optionalWithSeparator("weeks"),
  optionalWithSeparator("days"),
  String.raw`(?<hours>\d+):(?<mins>\d{2}):(?<secs>${CLOCK_SECONDS})`,
].join("");

const DAY_CLOCK = String.raw`(?<days>\d+):(?<hours>\d{2}):(?<mins>\d{2}):(?<secs>${CLOCK_SECONDS})`;

const SECOND_CLOCK = String.raw`:(?<secs>${CLOCK_SECONDS})`;

// =============================================================================
// Time formats
// =============================================================================

export type PatternName =
  | "compound"
  | "minute-clock"
  | "hour-clock"
  | "day-clock"
  | "second-clock";

export interface TimeFormat {
  readonly name: PatternName;
  /** Fields the format can capture, in group order. */
  readonly fields: readonly FieldName[];
  /** Anchored at both ends; input is trimmed before matching. */
  readonly regex: RegExp;
}

function timeFormat(
  name: PatternName,
  fields: readonly FieldName[],
  source: string
): TimeFormat {
  return Object.freeze({
    name,
    fields: Object.freeze([...fields]),
    regex: new RegExp(`^${source}$`, "i"),
  });
}

/**
 * Tried top to bottom; the first whole-string match wins. `compound` comes
 * first: it needs unit words, so clock strings fall through it.
 */
export const TIME_FORMATS: readonly TimeFormat[] = Object.freeze([
  timeFormat("compound", FIELD_NAMES, COMPOUND),
  timeFormat("minute-clock", ["mins", "secs"], MINUTE_CLOCK),
  timeFormat(
    "hour-clock",
    ["weeks", "days", "hours", "mins", "secs"],
    HOUR_CLOCK
  ),
  timeFormat("day-clock", ["days", "hours", "mins", "secs"], DAY_CLOCK),
  timeFormat("second-clock", ["secs"], SECOND_CLOCK),
]);

/**
 * Leading sign, then the rest of the line. `|` is accepted as a positive sign
 * for compatibility with expressions written for the `[+|-]` sign class.
 */
export const SIGN_PATTERN = /^(?<sign>[+|-])?\s*(?<unsigned>.*)$/;
