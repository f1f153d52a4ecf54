import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_PORT = 3001;
const DEFAULT_MAX_LADDER_WORD_LENGTH = 15;

export type ServerConfig = {
  port: number;
  wordListPath: string;
  maxWordLength: number;
};

function readPositiveInteger(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

export function resolveWordListPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.WORD_LIST_PATH ? path.resolve(env.WORD_LIST_PATH) : null;
  const candidates = [
    envPath,
    // Works from both server/src and the compiled dist/server/src.
    path.resolve(process.cwd(), "server", "wordlist.txt"),
    path.resolve(process.cwd(), "wordlist.txt"),
    path.resolve(__dirname, "..", "wordlist.txt"),
    path.resolve(__dirname, "..", "..", "..", "server", "wordlist.txt")
  ].filter((candidate): candidate is string => Boolean(candidate));

  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (found) return found;

  throw new Error(`Word list not found. Checked: ${candidates.join(", ")}`);
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readPositiveInteger(env.PORT, DEFAULT_PORT),
    wordListPath: resolveWordListPath(env),
    maxWordLength: readPositiveInteger(env.MAX_LADDER_WORD_LENGTH, DEFAULT_MAX_LADDER_WORD_LENGTH)
  };
}
