export type Side = "first" | "second";

export type GameType = "chess" | "xiangqi" | "xiangqi_oracle" | "xiangqi_simple";

export type TerminationReason =
  | "checkmate"
  | "stalemate"
  | "no-legal-moves"
  | "insufficient-material"
  | "threefold-repetition"
  | "fifty-move-rule"
  | "draw";

export type Reward = -1 | 0 | 1;

export interface GameResult {
  winner: Side | null;
  terminationReason: TerminationReason;
  plyCount: number;
}

export interface MoveOutcome {
  reward: Reward;
  done: boolean;
}

export interface BoardGeometry {
  width: number;
  height: number;
  /** Letters accepted as the fifth notation character. */
  promotions: readonly string[];
}

export const CHESS_GEOMETRY: BoardGeometry = {
  width: 8,
  height: 8,
  promotions: ["q", "r", "b", "n"],
};

export const XIANGQI_GEOMETRY: BoardGeometry = {
  width: 9,
  height: 10,
  promotions: [],
};

/** Dense `(planes, height, width)` tensor, row-major, values in {0, 1}. */
export interface Observation {
  shape: readonly [number, number, number];
  data: Float32Array;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export function opponentOf(side: Side): Side {
  return side === "first" ? "second" : "first";
}

export function cellCount(geometry: BoardGeometry): number {
  return geometry.width * geometry.height;
}
