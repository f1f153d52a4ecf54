import fs from "node:fs";

const LETTER_PATTERN = /^[a-z]+$/;

export type LoadWordSetOptions = {
  wordLength?: number;
};

export class DictionaryLoadError extends Error {
  readonly code = "DICTIONARY_UNREADABLE";

  constructor(readonly wordListPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read word list at ${wordListPath}: ${detail}`, { cause });
    this.name = "DictionaryLoadError";
  }
}

export function normalizeWord(word: string): string {
  return word.trim().toLowerCase();
}

/** Expects an already normalized word. */
export function isLadderWord(word: string): boolean {
  return LETTER_PATTERN.test(word);
}

export function parseWordList(raw: string, options: LoadWordSetOptions = {}): Set<string> {
  const words = raw
    .split(/\r?\n/)
    .map((line) => normalizeWord(line))
    .filter((word) => isLadderWord(word))
    .filter((word) => options.wordLength === undefined || word.length === options.wordLength);
  return new Set(words);
}

export function loadWordSet(wordListPath: string, options: LoadWordSetOptions = {}): Set<string> {
  let raw: string;
  try {
    raw = fs.readFileSync(wordListPath, "utf-8");
  } catch (error) {
    throw new DictionaryLoadError(wordListPath, error);
  }
  return parseWordList(raw, options);
}
