/**
 * timespan-parse/parse
 *
 * Public parsing operations. `parse()` returns `undefined` for anything it
 * cannot read; `parseResult()` and `parseDetailed()` keep the typed error.
 *
 * @example
 * ```typescript
 * parse('1:24');             // 84
 * parse('1:24', 'minutes');  // 5040
 * parse('1.2 seconds');      // 1.2
 * parse('-1d2h3m');          // -93780
 * parse('not a duration');   // undefined
 *
 * const strict = parseResult('1.2.3h');
 * if (!strict.ok) strict.error._tag; // 'InvalidNumeralError'
 * ```
 */

import {
  UnexpectedParseError,
  UnsupportedInputError,
  describeThrown,
  type DurationParseError,
} from "./errors";
import type { PatternName } from "./grammar";
import { matchDuration, type FieldMap } from "./matcher";
import {
  interpretAsMinutes,
  reduceMatch,
  type ParsedDuration,
} from "./reducer";
import { andThen, err, from, map, match, ok, type Result } from "./result";
import { extractSign } from "./sign";

// =============================================================================
// Options & Events
// =============================================================================

/**
 * How to read a bare two-field clock such as `1:24`: minutes and seconds
 * (`"seconds"`, the default) or hours and minutes (`"minutes"`).
 */
export type Granularity = "seconds" | "minutes";

export const DEFAULT_GRANULARITY: Granularity = "seconds";

export type DurationInput = string | number;

export type DurationEvent =
  | { type: "parse_start"; input: DurationInput; granularity: Granularity; ts: number }
  | { type: "pattern_matched"; pattern: PatternName; fields: FieldMap; ts: number }
  | { type: "numeral_fallback"; text: string; value: number; ts: number }
  | { type: "minutes_reinterpreted"; fields: FieldMap; ts: number }
  | { type: "parse_success"; result: ParsedDuration; ts: number; durationMs: number }
  | { type: "parse_error"; error: DurationParseError; ts: number; durationMs: number };

export interface ParseOptions {
  /** Defaults to `"seconds"`. */
  granularity?: Granularity;
  /**
   * Listener for parse events. Use this for logging or debugging; a listener
   * that throws turns the parse into an `UnexpectedParseError`.
   */
  onEvent?: (event: DurationEvent) => void;
}

type Emit = (event: DurationEvent) => void;

const unexpected = (thrown: unknown): UnexpectedParseError =>
  new UnexpectedParseError(
    { reason: describeThrown(thrown) },
    { cause: thrown }
  );

const secondsOrUndefined = (
  result: Result<number, DurationParseError>
): number | undefined =>
  match(result, {
    ok: (seconds): number | undefined => seconds,
    err: () => undefined,
  });

// =============================================================================
// Pipeline
// =============================================================================

function parseText(
  text: string,
  granularity: Granularity,
  emit: Emit
): Result<ParsedDuration, DurationParseError> {
  const signed = extractSign(text);
  if (!signed.ok) return signed;
  const { sign, unsigned } = signed.value;

  return map(matchDuration(unsigned), (matched) => {
    if (matched.kind === "numeral") {
      emit({
        type: "numeral_fallback",
        text: matched.text,
        value: matched.value,
        ts: Date.now(),
      });
      return reduceMatch(matched, sign);
    }

    emit({
      type: "pattern_matched",
      pattern: matched.pattern,
      fields: matched.fields,
      ts: Date.now(),
    });
    if (granularity !== "minutes") return reduceMatch(matched, sign);

    const reinterpreted = interpretAsMinutes(matched);
    if (reinterpreted !== matched) {
      emit({
        type: "minutes_reinterpreted",
        fields: reinterpreted.fields,
        ts: Date.now(),
      });
    }
    return reduceMatch(reinterpreted, sign);
  });
}

function parseInput(
  input: DurationInput,
  granularity: Granularity,
  emit: Emit
): Result<ParsedDuration, DurationParseError> {
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      return err(
        new UnsupportedInputError({ received: `the number ${input}` })
      );
    }
    const seconds = Math.trunc(input);
    const passthrough: ParsedDuration = {
      seconds: Object.is(seconds, -0) ? 0 : seconds,
      kind: "integer",
      sign: input < 0 ? -1 : 1,
      source: "number",
      fields: {},
    };
    return ok(passthrough);
  }
  if (typeof input === "string") return parseText(input, granularity, emit);
  return err(
    new UnsupportedInputError({ received: `a value of type ${typeof input}` })
  );
}

/**
 * Parses a duration expression and reports how it was read.
 *
 * Never throws: anything thrown while parsing (including by `onEvent`)
 * becomes an `UnexpectedParseError` whose `cause` is the thrown value.
 */
export function parseDetailed(
  input: DurationInput,
  options: ParseOptions = {}
): Result<ParsedDuration, DurationParseError> {
  const granularity = options.granularity ?? DEFAULT_GRANULARITY;
  const onEvent = options.onEvent;
  const emit: Emit = (event) => onEvent?.(event);
  const startTime = performance.now();

  const outcome = andThen(
    from(
      () => {
        emit({ type: "parse_start", input, granularity, ts: Date.now() });
        return parseInput(input, granularity, emit);
      },
      unexpected
    ),
    (result) => result
  );

  // A listener throwing on the closing event also ends in an Err.
  const closed = from(
    () => {
      const durationMs = performance.now() - startTime;
      if (outcome.ok) {
        emit({
          type: "parse_success",
          result: outcome.value,
          ts: Date.now(),
          durationMs,
        });
      } else {
        emit({
          type: "parse_error",
          error: outcome.error,
          ts: Date.now(),
          durationMs,
        });
      }
    },
    unexpected
  );

  return closed.ok ? outcome : closed;
}

/**
 * Parses a duration expression into signed seconds, keeping the failure.
 */
export function parseResult(
  input: DurationInput,
  options: ParseOptions = {}
): Result<number, DurationParseError> {
  return map(parseDetailed(input, options), (parsed) => parsed.seconds);
}

/**
 * Parses a duration expression into signed seconds.
 *
 * Numbers pass through truncated toward zero. Returns `undefined` when the
 * input cannot be read as a duration.
 *
 * @example
 * ```typescript
 * parse('1 minute, 24 secs'); // 84
 * parse('1.2 minutes');       // 72
 * parse(':22');               // 22
 * parse(42.9);                // 42
 * ```
 */
export function parse(
  input: DurationInput,
  granularity: Granularity = DEFAULT_GRANULARITY
): number | undefined {
  return secondsOrUndefined(parseResult(input, { granularity }));
}

// =============================================================================
// Configured parser
// =============================================================================

export interface DurationParser {
  parse(input: DurationInput, options?: ParseOptions): number | undefined;
  parseResult(
    input: DurationInput,
    options?: ParseOptions
  ): Result<number, DurationParseError>;
  parseDetailed(
    input: DurationInput,
    options?: ParseOptions
  ): Result<ParsedDuration, DurationParseError>;
}

/**
 * Creates a parser with default options. Per-call options win over the
 * defaults, key by key.
 *
 * @example
 * ```typescript
 * const parser = createParser({
 *   granularity: 'minutes',
 *   onEvent: (event) => logger.debug(event.type, event),
 * });
 *
 * parser.parse('1:30');                             // 5400
 * parser.parse('1:30', { granularity: 'seconds' }); // 90
 * ```
 */
export function createParser(defaults: ParseOptions = {}): DurationParser {
  const resolve = (options?: ParseOptions): ParseOptions => ({
    granularity: options?.granularity ?? defaults.granularity,
    onEvent: options?.onEvent ?? defaults.onEvent,
  });

  return {
    parse: (input, options) =>
      secondsOrUndefined(parseResult(input, resolve(options))),
    parseResult: (input, options) => parseResult(input, resolve(options)),
    parseDetailed: (input, options) => parseDetailed(input, resolve(options)),
  };
}
