import type { FileHandle } from "node:fs/promises";
import type { Mode, OpenMode, PathLike } from "node:fs";
import type { Awaitable } from "../ports/mod.ts";
import { bracketAsync, type BracketOutcome } from "../core/bracket.ts";
import { type Result, toError, tryAsync } from "../core/result.ts";

export type FileHost = {
  open(path: PathLike, flags?: OpenMode, mode?: Mode): Promise<FileHandle>;
};

export type FileUse<A, EU> = (file: FileHandle) => Awaitable<Result<A, EU>>;

// Open errors surface as acquire failures, close errors as release failures.
export type FileOutcome<A, EU> = BracketOutcome<A, Error, EU, Error>;

export function fileOps(host: FileHost) {
  async function withOpenFile<A, EU = never>(
    path: PathLike,
    flags: OpenMode,
    mode: Mode,
    use: FileUse<A, EU>,
  ): Promise<FileOutcome<A, EU>> {
    return await bracketAsync(
      () => tryAsync(() => host.open(path, flags, mode), toError),
      (file) => tryAsync(() => file.close(), toError),
      use,
    );
  }

  /** Opens `path` read-only. */
  function withOpen<A, EU = never>(
    path: PathLike,
    use: FileUse<A, EU>,
  ): Promise<FileOutcome<A, EU>> {
    return withOpenFile(path, "r", 0o666, use);
  }

  /** Creates or truncates `path` and opens it read/write. */
  function withCreate<A, EU = never>(
    path: PathLike,
    use: FileUse<A, EU>,
  ): Promise<FileOutcome<A, EU>> {
    return withOpenFile(path, "w+", 0o666, use);
  }

  return { withOpen, withCreate, withOpenFile };
}
