import natural from "natural";
import type { LadderCheck } from "./types.js";
import { isLadderWord, normalizeWord } from "./wordValidation.js";

const { HammingDistance } = natural;

/**
 * Checks a submitted ladder against a lowercase dictionary. The first and last
 * words are accepted whether or not the dictionary lists them.
 */
export function isValidLadder(words: readonly string[], dictionary: ReadonlySet<string>): LadderCheck {
  if (words.length === 0) {
    return { valid: false, reason: "A ladder needs at least one word." };
  }

  const normalized = words.map((word) => normalizeWord(word));
  const malformed = normalized.find((word) => !isLadderWord(word));
  if (malformed !== undefined) {
    return { valid: false, reason: `'${malformed}' is not made of letters only.` };
  }

  for (let index = 1; index < normalized.length; index += 1) {
    const previous = normalized[index - 1];
    const current = normalized[index];
    if (previous.length !== current.length || HammingDistance(previous, current, false) !== 1) {
      return {
        valid: false,
        reason: `'${previous}' and '${current}' do not differ by exactly one letter.`
      };
    }
  }

  for (const word of normalized.slice(1, -1)) {
    if (!dictionary.has(word)) {
      return { valid: false, reason: `'${word}' is not in the dictionary.` };
    }
  }

  return { valid: true };
}
