import assert from "node:assert/strict";
import test from "node:test";
import { isValidLadder } from "./ladderCheck.js";

const DICTIONARY = new Set(["cot", "cog"]);

test("isValidLadder accepts a one-letter-per-step ladder", () => {
  assert.deepEqual(isValidLadder(["cat", "cot", "cog", "dog"], DICTIONARY), { valid: true });
  assert.deepEqual(isValidLadder(["Cat", "COT"], DICTIONARY), { valid: true });
});

test("isValidLadder accepts a single word", () => {
  assert.deepEqual(isValidLadder(["fore"], DICTIONARY), { valid: true });
});

test("isValidLadder rejects an empty ladder", () => {
  assert.deepEqual(isValidLadder([], DICTIONARY), {
    valid: false,
    reason: "A ladder needs at least one word."
  });
});

test("isValidLadder rejects words with non-letters", () => {
  assert.deepEqual(isValidLadder(["cat", "c0t"], DICTIONARY), {
    valid: false,
    reason: "'c0t' is not made of letters only."
  });
});

test("isValidLadder rejects steps that change more than one letter", () => {
  assert.deepEqual(isValidLadder(["cat", "cog"], DICTIONARY), {
    valid: false,
    reason: "'cat' and 'cog' do not differ by exactly one letter."
  });
  assert.deepEqual(isValidLadder(["cat", "cats"], DICTIONARY), {
    valid: false,
    reason: "'cat' and 'cats' do not differ by exactly one letter."
  });
  assert.deepEqual(isValidLadder(["cat", "cat"], DICTIONARY), {
    valid: false,
    reason: "'cat' and 'cat' do not differ by exactly one letter."
  });
});

test("isValidLadder requires interior words to be in the dictionary", () => {
  assert.deepEqual(isValidLadder(["cat", "bat", "bot"], DICTIONARY), {
    valid: false,
    reason: "'bat' is not in the dictionary."
  });
});
