// String() throws for prototype-less objects and for a throwing toString.
const tagOf = (value: unknown): string => Object.prototype.toString.call(value);

/** `String(value)`, falling back to the object tag when conversion throws. */
export const stringOf = (value: unknown): string => {
  try {
    return String(value);
  } catch {
    return tagOf(value);
  }
};

/** The message of an Error, or {@link stringOf} for anything else. */
export const messageOf = (value: unknown): string => {
  try {
    return value instanceof Error ? String(value.message) : String(value);
  } catch {
    return tagOf(value);
  }
};

/**
 * Both the use step and the release step failed for the same resource.
 * Neither side is flattened into the message: read `useError` and
 * `releaseError` (or `errors`, in that order) to recover them.
 */
export class CombinedError<U = unknown, R = unknown> extends AggregateError {
  override readonly name = "CombinedError";
  declare readonly errors: [U, R];

  constructor(readonly useError: U, readonly releaseError: R) {
    super(
      [useError, releaseError],
      `use failed and release failed: ${messageOf(useError)}; ${
        messageOf(releaseError)
      }`,
    );
  }
}

// A combination can only occur when both sides have a failure channel.
export type Combined<U, R> = [U] extends [never] ? never
  : [R] extends [never] ? never
  : CombinedError<U, R>;

export function combine<U, R>(useError: U, releaseError: R): Combined<U, R>;
export function combine<U, R>(
  useError: U,
  releaseError: R,
): CombinedError<U, R> {
  return new CombinedError(useError, releaseError);
}

export const isCombinedError = (value: unknown): value is CombinedError =>
  value instanceof CombinedError;

export type UsageErrorCode = "NOT_CALLABLE";

export class BracketUsageError extends Error {
  override readonly name = "BracketUsageError";

  constructor(readonly code: UsageErrorCode, message: string) {
    super(message);
  }
}
