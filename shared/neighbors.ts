import { normalizeWord } from "./wordValidation.js";

const WILDCARD = "_";

export interface NeighborIndex {
  /** Same words, in the same order, as a linear `neighbors` scan over the indexed words. */
  neighbors(word: string): string[];
}

function differsByOneLetter(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  let mismatches = 0;
  for (let index = 0; index < a.length; index += 1) {
    if (a[index] !== b[index]) {
      mismatches += 1;
      if (mismatches > 1) return false;
    }
  }
  return mismatches === 1;
}

export function wildcardPatterns(word: string): string[] {
  const patterns: string[] = [];
  for (let index = 0; index < word.length; index += 1) {
    patterns.push(`${word.slice(0, index)}${WILDCARD}${word.slice(index + 1)}`);
  }
  return patterns;
}

export function neighbors(word: string, dictionary: Iterable<string>): string[] {
  const normalized = normalizeWord(word);
  const found: string[] = [];
  const seen = new Set<string>();
  for (const entry of dictionary) {
    const candidate = normalizeWord(entry);
    if (seen.has(candidate)) continue;
    if (!differsByOneLetter(normalized, candidate)) continue;
    seen.add(candidate);
    found.push(candidate);
  }
  return found;
}

export function createNeighborIndex(words: Iterable<string>): NeighborIndex {
  // Position of each word in the input; keeps output in input order.
  const rank = new Map<string, number>();
  const buckets = new Map<string, string[]>();

  for (const entry of words) {
    const word = normalizeWord(entry);
    if (!word || rank.has(word)) continue;
    rank.set(word, rank.size);
    for (const pattern of wildcardPatterns(word)) {
      const bucket = buckets.get(pattern);
      if (bucket) {
        bucket.push(word);
      } else {
        buckets.set(pattern, [word]);
      }
    }
  }

  const rankOf = (word: string) => rank.get(word) ?? rank.size;

  return {
    neighbors(word) {
      const normalized = normalizeWord(word);
      const found = new Set<string>();
      for (const pattern of wildcardPatterns(normalized)) {
        for (const candidate of buckets.get(pattern) ?? []) {
          // A literal "_" in either word can share a bucket key across positions.
          if (differsByOneLetter(normalized, candidate)) {
            found.add(candidate);
          }
        }
      }
      return [...found].sort((a, b) => rankOf(a) - rankOf(b));
    }
  };
}
