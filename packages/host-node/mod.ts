import { mkdtemp as _mkdtemp, open as _open, rm as _rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LogLevel, LogPort } from "../ports/mod.ts";
import type { FileHost } from "../resources/file.ts";
import type { FsHost } from "../resources/fs.ts";

// --- Logger ---
export function makeLogger(
  level: LogLevel = "info",
  write: (line: string) => void = (line) => console.log(line),
): LogPort {
  const levels: LogLevel[] = ["debug", "info", "warn", "error"];
  const idx = levels.indexOf(level);
  const log = (lvl: LogLevel) => (msg: string, data?: unknown) => {
    if (levels.indexOf(lvl) < idx) return;
    const payload = data === undefined ? "" : ` ${JSON.stringify(data)}`;
    write(`[${lvl}] ${msg}${payload}`);
  };
  return {
    level,
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

// --- FS host for tempDir and file wrappers ---
export const fs: FsHost & FileHost = {
  async mkdtemp(prefix = "tmp-") {
    return await _mkdtemp(join(tmpdir(), prefix));
  },
  async rm(path: string, opts?: { recursive?: boolean }) {
    await _rm(path, { recursive: opts?.recursive ?? true, force: true });
  },
  async open(path, flags, mode) {
    return await _open(path, flags, mode);
  },
};
