import { test } from "node:test";
import assert from "node:assert/strict";
import {
  bracketAsync,
  bracketInfallibleAsync,
  withResourceAsync,
  withResourceInfallibleAsync,
} from "./bracket.ts";
import { isCombinedError } from "./errors.ts";
import { err, ok, type Result } from "./result.ts";
import { fakeAsyncCloser, probe } from "../testing/mod.ts";

const sleep = (ms: number) => new Promise((res) => setTimeout(res, ms));

test("async: failed acquire skips use and release", async () => {
  const use = probe(async (_r: number) => ok());
  const release = probe(async (_r: number): Promise<Result<void, string>> =>
    ok()
  );

  const outcome = await bracketAsync(async () => err("EA"), release.fn, use.fn);

  assert.deepEqual(outcome, { ok: false, error: "EA" });
  assert.equal(use.calls.length, 0);
  assert.equal(release.calls.length, 0);
});

test("async: release waits for a suspended use", async () => {
  const events: string[] = [];

  const outcome = await bracketAsync(
    async () => ok("conn"),
    async (r) => {
      events.push(`release ${r}`);
      return ok();
    },
    async (r) => {
      events.push("use start");
      await sleep(5);
      events.push("use end");
      return ok(r.length);
    },
  );

  assert.deepEqual(outcome, { ok: true, value: 4 });
  assert.deepEqual(events, ["use start", "use end", "release conn"]);
});

test("async: the call settles only after release has settled", async () => {
  let released = false;

  await bracketAsync(
    () => ok(1),
    async () => {
      await sleep(5);
      released = true;
      return ok();
    },
    () => ok(),
  );

  assert.equal(released, true);
});

test("async: use and release failing yields a combined failure", async () => {
  const outcome = await bracketAsync(
    () => ok(1),
    async (): Promise<Result<void, string>> => err("E2"),
    async () => err("E1"),
  );

  assert.equal(outcome.ok, false);
  if (outcome.ok || !isCombinedError(outcome.error)) return assert.fail();
  assert.equal(outcome.error.useError, "E1");
  assert.equal(outcome.error.releaseError, "E2");
});

test("async: release failure alone is reported when use succeeds", async () => {
  const outcome = await bracketAsync(
    () => ok(1),
    async (): Promise<Result<void, string>> => err("E2"),
    async () => ok("v"),
  );

  assert.deepEqual(outcome, { ok: false, error: "E2" });
});

test("async: rejected use is rethrown after release", async () => {
  const release = probe(async (_r: number) => ok());

  await assert.rejects(
    bracketAsync(() => ok(1), release.fn, async () => {
      await sleep(1);
      throw new Error("use rejected");
    }),
    { message: "use rejected" },
  );
  assert.deepEqual(release.calls, [[1]]);
});

test("async: rejected use with a rejected release rejects with both", async () => {
  await assert.rejects(
    bracketAsync(
      () => ok(1),
      () => Promise.reject(new Error("release rejected")),
      () => Promise.reject(new Error("use rejected")),
    ),
    (e: unknown) =>
      isCombinedError(e) &&
      e.message === "use failed and release failed: use rejected; release rejected",
  );
});

test("async: independent calls each release their own resource", async () => {
  const released: number[] = [];

  const outcomes = await Promise.all([1, 2, 3].map((n) =>
    bracketAsync(
      () => ok(n),
      (r) => {
        released.push(r);
        return ok();
      },
      async (r) => {
        await sleep(4 - r);
        return ok(r * 10);
      },
    )
  ));

  assert.deepEqual(outcomes, [
    { ok: true, value: 10 },
    { ok: true, value: 20 },
    { ok: true, value: 30 },
  ]);
  assert.deepEqual([...released].sort(), [1, 2, 3]);
});

test("async infallible: awaits release and reports use failure only", async () => {
  let released = 0;

  const outcome = await bracketInfallibleAsync(
    () => ok(1),
    async () => {
      await sleep(1);
      released++;
    },
    () => err("E1"),
  );

  assert.deepEqual(outcome, { ok: false, error: "E1" });
  assert.equal(released, 1);
});

test("withResourceAsync reports a failed close", async () => {
  const conn = fakeAsyncCloser<string>(err("E2"), 2);

  const outcome = await withResourceAsync(() => ok(conn), async () => ok(1));

  assert.deepEqual(outcome, { ok: false, error: "E2" });
  assert.equal(conn.closed, 1);
});

test("withResourceAsync matches bracketAsync with the close capability", async () => {
  const viaWith = await withResourceAsync(
    () => ok(fakeAsyncCloser<string>(ok())),
    () => err("E1"),
  );
  const viaBracket = await bracketAsync(
    () => ok(fakeAsyncCloser<string>(ok())),
    (r) => r.close(),
    () => err("E1"),
  );

  assert.deepEqual(viaWith, viaBracket);
  assert.deepEqual(viaWith, { ok: false, error: "E1" });
});

test("withResourceInfallibleAsync closes once", async () => {
  let closed = 0;
  const handle = {
    async close() {
      closed++;
    },
  };

  const outcome = await withResourceInfallibleAsync(
    async () => ok(handle),
    async () => ok("read"),
  );

  assert.deepEqual(outcome, { ok: true, value: "read" });
  assert.equal(closed, 1);
});
