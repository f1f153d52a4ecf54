import fs from "node:fs";
import type { LadderResult } from "../../shared/types.js";

export const NO_PATH_LINE = "no path found";

export function formatLadderResult(result: LadderResult): string {
  if (result.status === "not-found") {
    return `${NO_PATH_LINE}\n`;
  }
  return result.ladder.map((word) => `${word}\n`).join("");
}

export function writeLadderResult(resultPath: string, result: LadderResult): void {
  fs.writeFileSync(resultPath, formatLadderResult(result), "utf-8");
}
