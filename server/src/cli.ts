import { findShortestPath, LadderInputError } from "../../shared/ladder.js";
import { DictionaryLoadError, loadWordSet, normalizeWord } from "../../shared/wordValidation.js";
import { writeLadderResult } from "./resultWriter.js";

export const USAGE = "Usage: word-ladder <dictionary-file> <start-word> <end-word> <result-file>";

export type CliArgs = {
  dictionaryFile: string;
  startWord: string;
  endWord: string;
  resultFile: string;
};

export type ParsedCliArgs =
  | Readonly<{ ok: true; args: CliArgs }>
  | Readonly<{ ok: false; reason: string }>;

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  if (argv.includes("--help")) {
    return { ok: false, reason: USAGE };
  }
  const unknownOption = argv.find((arg) => arg.startsWith("--"));
  if (unknownOption !== undefined) {
    return { ok: false, reason: `Unknown option '${unknownOption}'.\n${USAGE}` };
  }
  if (argv.length !== 4) {
    return {
      ok: false,
      reason: `Expected 4 arguments but received ${argv.length}.\n${USAGE}`
    };
  }
  const [dictionaryFile, startWord, endWord, resultFile] = argv;
  return { ok: true, args: { dictionaryFile, startWord, endWord, resultFile } };
}

/** Returns the process exit code. */
export function runCli(argv: readonly string[]): number {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(parsed.reason);
    return 1;
  }
  const { dictionaryFile, startWord, endWord, resultFile } = parsed.args;

  try {
    // Words of any other length can never join the ladder.
    const wordLength = normalizeWord(startWord).length;
    const wordSet = loadWordSet(dictionaryFile, { wordLength });
    console.log(`[dictionary] Loaded ${wordSet.size} ${wordLength}-letter words from ${dictionaryFile}`);

    for (const word of [startWord, endWord]) {
      const normalized = normalizeWord(word);
      if (normalized.length === wordLength && !wordSet.has(normalized)) {
        console.warn(`[ladder] '${normalized}' is not contained in the dictionary; searching from it anyway.`);
      }
    }

    const result = findShortestPath(startWord, endWord, wordSet);
    if (result.status === "found") {
      console.log(
        `[ladder] Found ${result.ladder.length}-word ladder after exploring ${result.explored} words.`
      );
    } else {
      console.log(
        `[ladder] No path from '${startWord}' to '${endWord}' after exploring ${result.explored} words.`
      );
    }

    writeLadderResult(resultFile, result);
    console.log(`[ladder] Result written to ${resultFile}`);
    return 0;
  } catch (error) {
    if (error instanceof DictionaryLoadError || error instanceof LadderInputError) {
      console.error(`[ladder] ${error.message}`);
      return 1;
    }
    console.error("[ladder] Run failed", error);
    return 1;
  }
}
