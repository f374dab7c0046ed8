import type { Awaitable } from "../ports/mod.ts";
import { messageOf } from "./errors.ts";

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };

/** Return-style outcome: every bracket callback and every bracket call speaks it. */
export type Result<T, E> = Ok<T> | Err<E>;

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok(value?: unknown): Ok<unknown> {
  return { ok: true, value };
}

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  throw new Error(`Unwrap failed: ${messageOf(r.error)}`, { cause: r.error });
};

export const unwrapOr = <T, E>(r: Result<T, E>, fallback: T): T =>
  r.ok ? r.value : fallback;

export const unwrapOrElse = <T, E>(
  r: Result<T, E>,
  fn: (e: E) => T,
): T => (r.ok ? r.value : fn(r.error));

export const map = <T, E, U>(
  r: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> => (r.ok ? ok(fn(r.value)) : r);

export const mapErr = <T, E, F>(
  r: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> => (r.ok ? r : err(fn(r.error)));

export const flatMap = <T, E, U, F = E>(
  r: Result<T, E>,
  fn: (value: T) => Result<U, F>,
): Result<U, E | F> => (r.ok ? fn(r.value) : r);

export const matchResult = <T, E, R>(
  result: Result<T, E>,
  onOk: (value: T) => R,
  onErr: (error: E) => R,
): R => (result.ok ? onOk(result.value) : onErr(result.error));

// Thrown values are caught as `unknown`; pass mapError to type them.
export function trySync<T>(fn: () => T): Result<T, unknown>;
export function trySync<T, E>(
  fn: () => T,
  mapError: (e: unknown) => E,
): Result<T, E>;
export function trySync<T, E>(
  fn: () => T,
  mapError?: (e: unknown) => E,
): Result<T, unknown> {
  try {
    return ok(fn());
  } catch (e) {
    return err(mapError ? mapError(e) : e);
  }
}

export function tryAsync<T>(
  fn: () => Awaitable<T>,
): Promise<Result<T, unknown>>;
export function tryAsync<T, E>(
  fn: () => Awaitable<T>,
  mapError: (e: unknown) => E,
): Promise<Result<T, E>>;
export async function tryAsync<T, E>(
  fn: () => Awaitable<T>,
  mapError?: (e: unknown) => E,
): Promise<Result<T, unknown>> {
  try {
    return ok(await fn());
  } catch (e) {
    return err(mapError ? mapError(e) : e);
  }
}

export const fromPromise = <T, E>(
  promise: PromiseLike<T>,
  mapError: (e: unknown) => E,
): Promise<Result<T, E>> => tryAsync(() => promise, mapError);

/** Normalizes anything thrown into an Error, keeping Error instances as-is. */
export const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(messageOf(e), { cause: e });
