/**
 * Type tests for timespan-parse
 * Checked by `tsc --noEmit`; written against tsd's expectType.
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  Timespan,
  createParser,
  parse,
  parseDetailed,
  parseResult,
  andThen,
  err,
  map,
  mapError,
  ok,
  InvalidNumeralError,
  MalformedDurationError,
  UnexpectedParseError,
  UnsupportedInputError,
  type DurationEvent,
  type DurationParseError,
  type Err,
  type ErrorByTag,
  type Ok,
  type ParsedDuration,
  type PropsOf,
  type Result,
  type TagOf,
} from "./index";
const { TaggedError } = Timespan;

// =============================================================================
// TEST: parsing operations
// =============================================================================

function _testParse() {
  expectType<number | undefined>(parse("1:24"));
  expectType<number | undefined>(parse(42, "minutes"));
  // @ts-expect-error - granularity is "seconds" or "minutes"
  parse("1:24", "hours");
  // @ts-expect-error - only text and numbers are durations
  parse(new Date());

  expectType<Result<number, DurationParseError>>(parseResult("1m"));
  expectType<Result<ParsedDuration, DurationParseError>>(parseDetailed("1m"));

  const parser = createParser({ granularity: "minutes" });
  expectType<number | undefined>(parser.parse("1:30", { granularity: "seconds" }));
}

function _testDetailedNarrowing() {
  const result = parseDetailed("1:22:33.5");
  if (result.ok) {
    expectType<number>(result.value.seconds);
    expectType<"integer" | "float">(result.value.kind);
    expectType<1 | -1>(result.value.sign);
  } else {
    expectType<DurationParseError>(result.error);
  }
}

function _testEvents() {
  createParser({
    onEvent: (event) => {
      expectType<DurationEvent>(event);
      if (event.type === "parse_error") {
        expectType<DurationParseError>(event.error);
      }
      if (event.type === "parse_success") {
        expectType<number>(event.durationMs);
      }
    },
  });
}

// =============================================================================
// TEST: Result transformers keep the branch they were given
// =============================================================================

function _testTransformOverloads() {
  expectType<Ok<number>>(map(ok(2), (n) => n * 60));
  expectType<Err<string, unknown>>(map(err("nope"), (n: number) => n * 60));
  expectType<Ok<number>>(mapError(ok(2), (e: string) => e.length));
  expectType<Err<number, unknown>>(mapError(err("nope"), (e) => e.length));
  expectType<Ok<number>>(andThen(ok(8), (n) => ok(n / 2)));

  const half = (n: number): Result<number, string> =>
    n % 2 === 0 ? ok(n / 2) : err("odd");
  expectType<Result<number, string, unknown>>(andThen(ok(8), half));

  const parsed = parseResult("1m");
  expectType<Result<number, DurationParseError, unknown>>(
    map(parsed, (seconds) => seconds * 1000)
  );
}

// =============================================================================
// TEST: error union
// =============================================================================

function _testTagOf() {
  type AllTags = TagOf<DurationParseError>;
  expectType<
    | "MalformedDurationError"
    | "InvalidNumeralError"
    | "UnsupportedInputError"
    | "UnexpectedParseError"
  >({} as AllTags);
}

function _testErrorByTag() {
  type Invalid = ErrorByTag<DurationParseError, "InvalidNumeralError">;
  expectType<InvalidNumeralError>({} as Invalid);

  type Malformed = ErrorByTag<DurationParseError, "MalformedDurationError">;
  expectType<MalformedDurationError>({} as Malformed);
}

function _testSwitchNarrowing(error: DurationParseError) {
  switch (error._tag) {
    case "MalformedDurationError":
      expectType<string>(error.input);
      break;
    case "InvalidNumeralError":
      expectType<"weeks" | "days" | "hours" | "mins" | "secs" | "millis">(error.field);
      break;
    case "UnsupportedInputError":
      expectType<string>(error.received);
      break;
    case "UnexpectedParseError":
      expectType<string>(error.reason);
      break;
  }
}

function _testErrorConstructors() {
  new MalformedDurationError({ input: "soon" }); // OK
  // @ts-expect-error - required props cannot be omitted
  new MalformedDurationError();
  new UnexpectedParseError({ reason: "boom" }, { cause: new Error("boom") }); // OK
  // @ts-expect-error - received must be a string
  new UnsupportedInputError({ received: 1 });
}

// =============================================================================
// TEST: TaggedError factory
// =============================================================================

function _testTaggedError() {
  class RequiredError extends TaggedError("RequiredError")<{ id: string }> {}
  new RequiredError({ id: "123" }); // OK
  // @ts-expect-error - required props cannot be omitted
  new RequiredError();
  // @ts-expect-error - required props cannot be omitted (undefined not allowed)
  new RequiredError(undefined);

  class OptionalError extends TaggedError("OptionalError")<{ code?: number }> {}
  new OptionalError(); // OK - all props optional
  new OptionalError({ code: 404 }); // OK

  class MessageError extends TaggedError("MessageError", {
    message: (p: { field: string }) => `Invalid: ${p.field}`,
  }) {}
  expectType<"MessageError">(new MessageError({ field: "mins" })._tag);
  expectType<string>(new MessageError({ field: "mins" }).field);

  type Props = PropsOf<RequiredError>;
  expectType<string>(({} as Props).id);
}
