// Type-only module with public port surfaces

import type { Result } from "../core/result.ts";

export type Awaitable<T> = T | PromiseLike<T>;

// Close capabilities: a release action bound to the resource itself
export type Closer<E> = {
  close(): Result<void, E>;
};

export type InfallibleCloser = {
  close(): void;
};

export type AsyncCloser<E> = {
  close(): Awaitable<Result<void, E>>;
};

export type AsyncInfallibleCloser = {
  close(): Awaitable<void>;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogPort = {
  level: LogLevel;
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
};
