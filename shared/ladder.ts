import { createNeighborIndex } from "./neighbors.js";
import type { LadderResult } from "./types.js";
import { isLadderWord, normalizeWord } from "./wordValidation.js";

export type LadderInputErrorCode = "INVALID_WORD" | "LENGTH_MISMATCH";

export class LadderInputError extends Error {
  constructor(message: string, readonly code: LadderInputErrorCode) {
    super(message);
    this.name = "LadderInputError";
  }
}

type FrontierEntry = {
  word: string;
  path: string[];
};

function assertLadderWord(word: string, role: "start" | "end"): void {
  if (!isLadderWord(word)) {
    throw new LadderInputError(`The ${role} word '${word}' must contain letters only.`, "INVALID_WORD");
  }
}

/**
 * Breadth-first search over the implicit one-letter-change graph.
 *
 * The start and end words are always part of the search space, whether or not
 * the dictionary contains them. Among several shortest ladders the one found
 * first wins, and discovery follows the dictionary's iteration order, so the
 * same input always yields the same ladder.
 *
 * @throws LadderInputError when either word is not made of letters, when the
 * two lengths differ, or when the dictionary has no words of that length.
 */
export function findShortestPath(
  start: string,
  end: string,
  dictionary: Iterable<string>
): LadderResult {
  const from = normalizeWord(start);
  const to = normalizeWord(end);
  assertLadderWord(from, "start");
  assertLadderWord(to, "end");

  if (from.length !== to.length) {
    throw new LadderInputError(
      `Start word '${from}' has ${from.length} letters but end word '${to}' has ${to.length}.`,
      "LENGTH_MISMATCH"
    );
  }

  if (from === to) {
    return { status: "found", ladder: [from], explored: 1 };
  }

  const candidates: string[] = [];
  for (const entry of dictionary) {
    const word = normalizeWord(entry);
    if (word.length === from.length && isLadderWord(word)) {
      candidates.push(word);
    }
  }
  if (candidates.length === 0) {
    throw new LadderInputError(
      `The dictionary has no ${from.length}-letter words to connect '${from}' and '${to}'.`,
      "LENGTH_MISMATCH"
    );
  }

  const index = createNeighborIndex([...candidates, from, to]);
  const frontier: FrontierEntry[] = [{ word: from, path: [from] }];
  const visited = new Set<string>([from]);
  let head = 0;

  while (head < frontier.length) {
    const { word, path } = frontier[head];
    head += 1;

    if (word === to) {
      return { status: "found", ladder: path, explored: head };
    }

    for (const next of index.neighbors(word)) {
      if (visited.has(next)) continue;
      visited.add(next);
      frontier.push({ word: next, path: [...path, next] });
    }
  }

  return { status: "not-found", explored: head };
}
