import type {
  AsyncCloser,
  AsyncInfallibleCloser,
  Awaitable,
  Closer,
  InfallibleCloser,
} from "../ports/mod.ts";
import { type Combined, combine, CombinedError } from "./errors.ts";
import { err, ok, type Result } from "./result.ts";

/**
 * What a bracket call reports: the use value, or exactly one of the
 * acquire failure, the use failure, the release failure, or both of the
 * last two combined.
 */
export type BracketOutcome<A, EA, EU, ER> = Result<
  A,
  EA | EU | ER | Combined<EU, ER>
>;

/** Error type carried by a resource's close capability. */
export type CloseErrorOf<R> = R extends { close(): infer O }
  ? Awaited<O> extends Result<void, infer E> ? E : never
  : never;

// A phase either returned a Result or exited abnormally by throwing.
type Settled<T> =
  | { readonly threw: false; readonly result: T }
  | { readonly threw: true; readonly cause: unknown };

const attempt = <T>(fn: () => T): Settled<T> => {
  try {
    return { threw: false, result: fn() };
  } catch (cause) {
    return { threw: true, cause };
  }
};

const attemptAsync = async <T>(
  fn: () => Awaitable<T>,
): Promise<Settled<T>> => {
  try {
    return { threw: false, result: await fn() };
  } catch (cause) {
    return { threw: true, cause };
  }
};

// Returned failures stay returned, thrown failures stay thrown. A thrown
// side never hides a failure from the other side.
function settle<A, EU, ER>(
  used: Settled<Result<A, EU>>,
  released: Settled<Result<void, ER>>,
): Result<A, EU | ER | Combined<EU, ER>> {
  if (used.threw) {
    if (released.threw) throw new CombinedError(used.cause, released.cause);
    if (!released.result.ok) {
      throw new CombinedError(used.cause, released.result.error);
    }
    throw used.cause;
  }

  const outcome = used.result;
  if (released.threw) {
    if (!outcome.ok) throw new CombinedError(outcome.error, released.cause);
    throw released.cause;
  }

  const release = released.result;
  if (!outcome.ok) {
    return release.ok ? outcome : err(combine(outcome.error, release.error));
  }
  return release.ok ? outcome : release;
}

/**
 * Acquires a resource, hands it to `use`, then releases it.
 *
 * If `acquire` fails its failure is returned as-is and neither `use` nor
 * `release` runs. Otherwise `release` runs exactly once after `use`, even
 * when `use` fails or throws. When both `use` and `release` fail the
 * outcome is a {@link CombinedError} carrying both.
 */
export function bracket<R, A, EA = never, EU = never, ER = never>(
  acquire: () => Result<R, EA>,
  release: (resource: R) => Result<void, ER>,
  use: (resource: R) => Result<A, EU>,
): BracketOutcome<A, EA, EU, ER> {
  const acquired = acquire();
  if (!acquired.ok) return acquired;

  const resource = acquired.value;
  let used: Settled<Result<A, EU>>;
  let released: Settled<Result<void, ER>>;
  try {
    used = { threw: false, result: use(resource) };
  } catch (cause) {
    used = { threw: true, cause };
  } finally {
    released = attempt(() => release(resource));
  }
  return settle(used, released);
}

/** {@link bracket} for a release step that has no failure channel. */
export function bracketInfallible<R, A, EA = never, EU = never>(
  acquire: () => Result<R, EA>,
  release: (resource: R) => void,
  use: (resource: R) => Result<A, EU>,
): Result<A, EA | EU> {
  return bracket<R, A, EA, EU, never>(acquire, (resource) => {
    release(resource);
    return ok();
  }, use);
}

/** Brackets a resource that closes itself, reporting close failures. */
export function withResource<
  R extends Closer<ER>,
  A,
  EA = never,
  EU = never,
  ER = CloseErrorOf<R>,
>(
  acquire: () => Result<R, EA>,
  use: (resource: R) => Result<A, EU>,
): BracketOutcome<A, EA, EU, ER> {
  return bracket(acquire, (resource: R) => resource.close(), use);
}

export function withResourceInfallible<
  R extends InfallibleCloser,
  A,
  EA = never,
  EU = never,
>(
  acquire: () => Result<R, EA>,
  use: (resource: R) => Result<A, EU>,
): Result<A, EA | EU> {
  return bracketInfallible(acquire, (resource: R) => resource.close(), use);
}

/**
 * Async {@link bracket}. Each step may return its result or a promise of
 * it; `release` starts only after `use` has settled, and the returned
 * promise settles only after `release` has.
 */
export async function bracketAsync<R, A, EA = never, EU = never, ER = never>(
  acquire: () => Awaitable<Result<R, EA>>,
  release: (resource: R) => Awaitable<Result<void, ER>>,
  use: (resource: R) => Awaitable<Result<A, EU>>,
): Promise<BracketOutcome<A, EA, EU, ER>> {
  const acquired = await acquire();
  if (!acquired.ok) return acquired;

  const resource = acquired.value;
  let used: Settled<Result<A, EU>>;
  let released: Settled<Result<void, ER>>;
  try {
    used = { threw: false, result: await use(resource) };
  } catch (cause) {
    used = { threw: true, cause };
  } finally {
    released = await attemptAsync(() => release(resource));
  }
  return settle(used, released);
}

export async function bracketInfallibleAsync<
  R,
  A,
  EA = never,
  EU = never,
>(
  acquire: () => Awaitable<Result<R, EA>>,
  release: (resource: R) => Awaitable<void>,
  use: (resource: R) => Awaitable<Result<A, EU>>,
): Promise<Result<A, EA | EU>> {
  return await bracketAsync<R, A, EA, EU, never>(
    acquire,
    async (resource) => {
      await release(resource);
      return ok();
    },
    use,
  );
}

export async function withResourceAsync<
  R extends AsyncCloser<ER>,
  A,
  EA = never,
  EU = never,
  ER = CloseErrorOf<R>,
>(
  acquire: () => Awaitable<Result<R, EA>>,
  use: (resource: R) => Awaitable<Result<A, EU>>,
): Promise<BracketOutcome<A, EA, EU, ER>> {
  return await bracketAsync(acquire, (resource: R) => resource.close(), use);
}

export async function withResourceInfallibleAsync<
  R extends AsyncInfallibleCloser,
  A,
  EA = never,
  EU = never,
>(
  acquire: () => Awaitable<Result<R, EA>>,
  use: (resource: R) => Awaitable<Result<A, EU>>,
): Promise<Result<A, EA | EU>> {
  return await bracketInfallibleAsync(
    acquire,
    (resource: R) => resource.close(),
    use,
  );
}
