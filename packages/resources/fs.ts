import type { Awaitable } from "../ports/mod.ts";
import { bracketAsync, type BracketOutcome } from "../core/bracket.ts";
import { type Result, toError, tryAsync } from "../core/result.ts";

// Host is injected; host-node provides the real one
export type FsHost = {
  mkdtemp(prefix?: string): Promise<string>;
  rm(path: string, opts?: { recursive?: boolean }): Promise<void>;
};

export type TempDir = { readonly path: string };

export function tempDirOp(host: FsHost) {
  return async function acquire(
    prefix = "tmp-",
  ): Promise<Result<TempDir, Error>> {
    return await tryAsync(
      async () => ({ path: await host.mkdtemp(prefix) }),
      toError,
    );
  };
}

/** Runs `use` inside a fresh temp directory and removes it afterwards. */
export async function withTempDir<A, EU = never>(
  host: FsHost,
  prefix: string,
  use: (dir: TempDir) => Awaitable<Result<A, EU>>,
): Promise<BracketOutcome<A, Error, EU, Error>> {
  const acquire = tempDirOp(host);
  return await bracketAsync(
    () => acquire(prefix),
    (dir) => tryAsync(() => host.rm(dir.path, { recursive: true }), toError),
    use,
  );
}
