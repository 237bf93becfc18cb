import { MalformedDurationError } from "./errors";
import { SIGN_PATTERN } from "./grammar";
import { err, ok, type Result } from "./result";

export type Sign = 1 | -1;

export interface SignedText {
  readonly sign: Sign;
  /** Text after the sign and any whitespace following it. */
  readonly unsigned: string;
}

/**
 * Splits an optional leading sign off a duration expression.
 *
 * @example
 * ```typescript
 * extractSign(' - 1 minute'); // ok({ sign: -1, unsigned: '1 minute' })
 * extractSign('1:24');        // ok({ sign: 1, unsigned: '1:24' })
 * ```
 */
export function extractSign(
  text: string
): Result<SignedText, MalformedDurationError> {
  const groups = SIGN_PATTERN.exec(text.trim())?.groups;
  if (!groups) return err(new MalformedDurationError({ input: text }));

  const signed: SignedText = {
    sign: groups.sign === "-" ? -1 : 1,
    unsigned: groups.unsigned ?? "",
  };
  return ok(signed);
}
