import { z, ZodError } from "zod";
import { findShortestPath, LadderInputError } from "../../shared/ladder.js";
import { isValidLadder } from "../../shared/ladderCheck.js";
import { neighbors } from "../../shared/neighbors.js";
import type {
  ApiError,
  HealthResponse,
  LadderCheck,
  LadderResponse,
  NeighborsResponse
} from "../../shared/types.js";
import { normalizeWord } from "../../shared/wordValidation.js";

export type RouteResult<T> =
  | Readonly<{ status: 200; body: T }>
  | Readonly<{ status: 400; body: ApiError }>;

export type LadderRoutesOptions = {
  dictionary: ReadonlySet<string>;
  maxWordLength: number;
};

export interface LadderRoutes {
  health(): RouteResult<HealthResponse>;
  ladder(query: unknown): RouteResult<LadderResponse>;
  neighbors(params: unknown): RouteResult<NeighborsResponse>;
  checkLadder(body: unknown): RouteResult<LadderCheck>;
}

function badRequest(message: string, code: string): RouteResult<never> {
  return { status: 400, body: { message, code } };
}

function toBadRequest(error: unknown): RouteResult<never> {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const location = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return badRequest(`${location}${issue?.message ?? "Invalid request"}`, "BAD_REQUEST");
  }
  if (error instanceof LadderInputError) {
    return badRequest(error.message, error.code);
  }
  throw error;
}

export function createLadderRoutes({ dictionary, maxWordLength }: LadderRoutesOptions): LadderRoutes {
  const wordSchema = z.string().trim().min(1).max(maxWordLength);
  const ladderQuerySchema = z.object({ start: wordSchema, end: wordSchema });
  const neighborsParamsSchema = z.object({ word: wordSchema });
  const checkBodySchema = z.object({ words: z.array(wordSchema).min(1).max(256) });

  return {
    health() {
      return { status: 200, body: { ok: true, words: dictionary.size } };
    },
    ladder(query) {
      try {
        const { start, end } = ladderQuerySchema.parse(query);
        const result = findShortestPath(start, end, dictionary);
        return {
          status: 200,
          body: {
            status: result.status,
            ladder: result.status === "found" ? result.ladder : null
          }
        };
      } catch (error) {
        return toBadRequest(error);
      }
    },
    neighbors(params) {
      try {
        const word = normalizeWord(neighborsParamsSchema.parse(params).word);
        return { status: 200, body: { word, neighbors: neighbors(word, dictionary) } };
      } catch (error) {
        return toBadRequest(error);
      }
    },
    checkLadder(body) {
      try {
        const { words } = checkBodySchema.parse(body);
        return { status: 200, body: isValidLadder(words, dictionary) };
      } catch (error) {
        return toBadRequest(error);
      }
    }
  };
}
