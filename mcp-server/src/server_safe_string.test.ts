import test from "node:test";
import assert from "node:assert/strict";
import { logPreview, safeString } from "./server_safe_string.js";

test("safeString handles circular objects without throwing", () => {
  const loop: Record<string, unknown> = { x: 1 };
  loop.self = loop;
  const value = safeString(loop);
  assert.equal(typeof value, "string");
  assert.match(value, /x: 1/);
});

test("safeString renders errors with their cause", () => {
  const err = new Error("insert failed", { cause: new TypeError("disk full") });
  assert.equal(safeString(err), "Error: insert failed (cause: TypeError: disk full)");
});

test("safeString keeps primitives and undefined readable", () => {
  assert.equal(safeString("plain"), "plain");
  assert.equal(safeString(42), "42");
  assert.equal(safeString(false), "false");
  assert.equal(safeString(undefined), "undefined");
  assert.equal(safeString({ a: [1, 2] }), '{"a":[1,2]}');
});

test("logPreview flattens whitespace and caps length", () => {
  assert.equal(logPreview("первая строка\n  вторая"), "первая строка вторая");
  assert.equal(logPreview("abcdefghij", 4), "abcd…");
});
