import assert from "node:assert/strict";
import test from "node:test";
import { createLadderRoutes } from "./routes.js";

const routes = createLadderRoutes({
  dictionary: new Set(["cat", "cot", "cog", "dog", "fore", "tore"]),
  maxWordLength: 5
});

test("health reports the dictionary size", () => {
  assert.deepEqual(routes.health(), { status: 200, body: { ok: true, words: 6 } });
});

test("ladder returns the shortest ladder for a query", () => {
  assert.deepEqual(routes.ladder({ start: " Cat", end: "DOG" }), {
    status: 200,
    body: { status: "found", ladder: ["cat", "cot", "cog", "dog"] }
  });
});

test("ladder answers not-found with a null ladder", () => {
  assert.deepEqual(routes.ladder({ start: "fore", end: "tree" }), {
    status: 200,
    body: { status: "not-found", ladder: null }
  });
});

test("ladder maps invalid words to 400 responses", () => {
  assert.deepEqual(routes.ladder({ start: "cat", end: "fore" }), {
    status: 400,
    body: {
      message: "Start word 'cat' has 3 letters but end word 'fore' has 4.",
      code: "LENGTH_MISMATCH"
    }
  });
  assert.deepEqual(routes.ladder({ start: "c4t", end: "dog" }), {
    status: 400,
    body: { message: "The start word 'c4t' must contain letters only.", code: "INVALID_WORD" }
  });
});

test("ladder rejects malformed queries", () => {
  const missingEnd = routes.ladder({ start: "cat" });
  assert.ok(missingEnd.status === 400);
  assert.equal(missingEnd.body.code, "BAD_REQUEST");

  const tooLong = routes.ladder({ start: "cattle", end: "bottle" });
  assert.ok(tooLong.status === 400);
  assert.equal(tooLong.body.code, "BAD_REQUEST");

  const repeated = routes.ladder({ start: ["cat", "cot"], end: "dog" });
  assert.ok(repeated.status === 400);
  assert.equal(repeated.body.code, "BAD_REQUEST");
});

test("neighbors lists the normalized word's dictionary neighbors", () => {
  assert.deepEqual(routes.neighbors({ word: " COT " }), {
    status: 200,
    body: { word: "cot", neighbors: ["cat", "cog"] }
  });
});

test("checkLadder validates a submitted ladder", () => {
  assert.deepEqual(routes.checkLadder({ words: ["cat", "cot", "cog", "dog"] }), {
    status: 200,
    body: { valid: true }
  });
  assert.deepEqual(routes.checkLadder({ words: ["cat", "bat", "bot"] }), {
    status: 200,
    body: { valid: false, reason: "'bat' is not in the dictionary." }
  });
});

test("checkLadder rejects a body without words", () => {
  const result = routes.checkLadder({ words: [] });
  assert.ok(result.status === 400);
  assert.equal(result.body.code, "BAD_REQUEST");
});
