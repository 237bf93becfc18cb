/**
 * timespan-parse/tagged-error
 *
 * Error classes carrying a literal `_tag`, so a union of them can be narrowed
 * with a plain `switch (error._tag)`.
 *
 * @example
 * ```typescript
 * class NotADuration extends TaggedError('NotADuration')<{ input: string }> {}
 * class BadNumeral extends TaggedError('BadNumeral', {
 *   message: (p: { numeral: string }) => `Bad numeral ${p.numeral}`,
 * }) {}
 *
 * const error = new NotADuration({ input: 'soon' });
 * error._tag  // 'NotADuration'
 * error.input // 'soon'
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

export interface TaggedErrorOptions<P> {
  /** Builds `error.message` from the props. Defaults to the tag. */
  message?(props: P): string;
}

export interface TaggedErrorCreateOptions {
  /** Underlying error, exposed as the standard `Error.cause`. */
  cause?: unknown;
}

export type TaggedErrorInstance<Tag extends string, P> = TaggedErrorBase<Tag> &
  Readonly<P>;

// Props can be omitted only when every prop is optional.
// eslint-disable-next-line @typescript-eslint/no-empty-object-type
type ConstructorArgs<P> = {} extends P
  ? [props?: P, options?: TaggedErrorCreateOptions]
  : [props: P, options?: TaggedErrorCreateOptions];

/** Returned by `TaggedError(tag)`: props are supplied as a type argument. */
export type TaggedErrorConstructor<Tag extends string> = new <
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  P extends object = {},
>(
  ...args: ConstructorArgs<P>
) => TaggedErrorInstance<Tag, P>;

/** Returned by `TaggedError(tag, { message })`: props come from `message`. */
export type TaggedErrorClass<Tag extends string, P> = new (
  ...args: ConstructorArgs<P>
) => TaggedErrorInstance<Tag, P>;

// =============================================================================
// Type Utilities
// =============================================================================

/** The `_tag` literal of a tagged error (or union of them). */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/** The member of a tagged error union carrying `Tag`. */
export type ErrorByTag<E, Tag extends string> = Extract<E, { _tag: Tag }>;

/** The props of a tagged error, without the `Error` members. */
export type PropsOf<E> = Omit<E, keyof TaggedErrorBase>;

// =============================================================================
// Factory
// =============================================================================

class TaggedErrorImpl extends Error implements TaggedErrorBase {
  readonly _tag: string;

  constructor(
    tag: string,
    message: string,
    props: object | undefined,
    options: TaggedErrorCreateOptions | undefined
  ) {
    super(
      message,
      options?.cause !== undefined ? { cause: options.cause } : undefined
    );
    this._tag = tag;
    this.name = tag;
    if (props) Object.assign(this, props);
  }
}

export function TaggedError<Tag extends string>(
  tag: Tag
): TaggedErrorConstructor<Tag>;
export function TaggedError<Tag extends string, P extends object>(
  tag: Tag,
  options: TaggedErrorOptions<P>
): TaggedErrorClass<Tag, P>;
export function TaggedError(
  tag: string,
  options?: TaggedErrorOptions<object>
): unknown {
  const render = options?.message;
  return class extends TaggedErrorImpl {
    constructor(props?: object, createOptions?: TaggedErrorCreateOptions) {
      super(tag, render ? render(props ?? {}) : tag, props, createOptions);
    }
  };
}

/**
 * Checks whether a value was built by a `TaggedError()` class.
 * Plain objects with a `_tag` field do not count.
 */
export function isTaggedError(value: unknown): value is TaggedErrorBase {
  return value instanceof TaggedErrorImpl;
}
