import { join } from "node:path";
import { matchResult, ok } from "../../packages/core/mod.ts";
import { fs } from "../../packages/host-node/mod.ts";
import {
  withCreate,
  withOpen,
  withTempDir,
} from "../../packages/resources/mod.ts";

/**
 * Copies a file inside a scratch directory. Every handle and the directory
 * itself are released on the way out, whichever step fails.
 */

const outcome = await withTempDir(fs, "holdfast-copy-", async ({ path }) => {
  const source = join(path, "source.txt");
  const target = join(path, "target.txt");

  const seeded = await withCreate(source, async (f) => {
    await f.writeFile("bracketed bytes\n");
    return ok();
  });
  if (!seeded.ok) return seeded;

  const copied = await withOpen(source, async (from) => {
    const text = await from.readFile("utf8");
    return await withCreate(target, async (to) => {
      await to.writeFile(text);
      return ok(text.length);
    });
  });
  if (!copied.ok) return copied;

  return await withOpen(target, async (f) => ok(await f.readFile("utf8")));
});

matchResult(
  outcome,
  (text) => console.log("✓ Copied:", JSON.stringify(text)),
  (error) => console.error("✗ Copy failed:", error),
);
