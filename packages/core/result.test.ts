import { test } from "node:test";
import assert from "node:assert/strict";
import {
  err,
  flatMap,
  fromPromise,
  map,
  mapErr,
  matchResult,
  ok,
  toError,
  tryAsync,
  trySync,
  unwrap,
  unwrapOr,
  unwrapOrElse,
} from "./result.ts";

test("ok creates successful result", () => {
  const result = ok("success");
  assert.equal(result.ok, true);
  assert.equal(result.value, "success");
});

test("ok without a value carries undefined", () => {
  assert.deepEqual(ok(), { ok: true, value: undefined });
});

test("err creates error result", () => {
  const result = err("error");
  assert.equal(result.ok, false);
  assert.equal(result.error, "error");
});

test("map transforms successful result", () => {
  const mapped = map(ok(5), (x: number) => x * 2);
  assert.deepEqual(mapped, { ok: true, value: 10 });
});

test("map preserves error result", () => {
  const mapped = map(err("error"), (x: number) => x * 2);
  assert.deepEqual(mapped, { ok: false, error: "error" });
});

test("flatMap chains to error result", () => {
  const chained = flatMap(ok(5), (_x: number) => err("chained error"));
  assert.deepEqual(chained, { ok: false, error: "chained error" });
});

test("flatMap preserves original error", () => {
  const chained = flatMap(err("original error"), (x: number) => ok(x * 2));
  assert.deepEqual(chained, { ok: false, error: "original error" });
});

test("mapErr transforms error result", () => {
  const mapped = mapErr(err("error"), (e: string) => `transformed: ${e}`);
  assert.deepEqual(mapped, { ok: false, error: "transformed: error" });
});

test("unwrap returns the value or throws with the error message", () => {
  assert.equal(unwrap(ok(3)), 3);
  assert.throws(() => unwrap(err(new Error("closed"))), {
    message: "Unwrap failed: closed",
  });
  assert.throws(() => unwrap(err("EA")), { message: "Unwrap failed: EA" });
});

test("unwrapOr and unwrapOrElse fall back on error", () => {
  assert.equal(unwrapOr(err("x"), 7), 7);
  assert.equal(unwrapOrElse(err("abc"), (e: string) => e.length), 3);
  assert.equal(unwrapOrElse(ok(1), () => 2), 1);
});

test("matchResult picks the branch", () => {
  assert.equal(matchResult(ok(2), (v) => `ok:${v}`, () => "err"), "ok:2");
  assert.equal(matchResult(err("E1"), () => "ok", (e) => `err:${e}`), "err:E1");
});

test("trySync captures thrown values", () => {
  const thrown = new Error("boom");
  assert.deepEqual(trySync(() => 1), { ok: true, value: 1 });
  assert.deepEqual(
    trySync(() => {
      throw thrown;
    }),
    { ok: false, error: thrown },
  );
  assert.deepEqual(
    trySync(() => {
      throw "raw";
    }, (e) => `mapped:${String(e)}`),
    { ok: false, error: "mapped:raw" },
  );
});

test("tryAsync captures rejections", async () => {
  assert.deepEqual(await tryAsync(async () => "v"), { ok: true, value: "v" });
  const result = await tryAsync(() => Promise.reject("nope"), toError);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.ok(result.error instanceof Error);
    assert.equal(result.error.message, "nope");
    assert.equal(result.error.cause, "nope");
  }
});

test("fromPromise maps the rejection", async () => {
  const result = await fromPromise(Promise.reject(404), (e) => `status ${e}`);
  assert.deepEqual(result, { ok: false, error: "status 404" });
});

test("toError keeps Error instances", () => {
  const e = new TypeError("bad");
  assert.equal(toError(e), e);
});

test("unwrap and toError describe values that cannot be stringified", () => {
  const bare: object = Object.create(null);

  assert.throws(() => unwrap(err(bare)), {
    message: "Unwrap failed: [object Object]",
  });
  assert.equal(toError(bare).message, "[object Object]");
  assert.equal(toError(bare).cause, bare);
});
