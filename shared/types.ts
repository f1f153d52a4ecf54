export type Ladder = string[];

export type LadderResult =
  | Readonly<{
      status: "found";
      ladder: Ladder;
      explored: number;
    }>
  | Readonly<{
      status: "not-found";
      explored: number;
    }>;

export type LadderCheck =
  | Readonly<{ valid: true }>
  | Readonly<{ valid: false; reason: string }>;

export interface ApiError {
  message: string;
  code: string;
}

export interface LadderResponse {
  status: LadderResult["status"];
  ladder: Ladder | null;
}

export interface NeighborsResponse {
  word: string;
  neighbors: string[];
}

export interface HealthResponse {
  ok: true;
  words: number;
}
