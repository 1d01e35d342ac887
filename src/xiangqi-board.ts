import type { GameBoard } from "./board.js";
import { rewardFor } from "./board.js";
import { renderXiangqiBoard } from "./board-render.js";
import { IllegalMoveError } from "./errors.js";
import { Move } from "./move.js";
import { createObservation, planesFromPlacement } from "./observation.js";
import { XIANGQI_GEOMETRY, opponentOf, type GameResult, type MoveOutcome, type Observation, type Side } from "./types.js";
import {
  XIANGQI_START_FEN,
  applyCellMove,
  generateLegalMoves,
  hasAttackingMaterial,
  isInCheck,
  parseXiangqiFen,
  placementOf,
  serializeXiangqiFen,
  type XiangqiPosition,
} from "./xiangqi-rules.js";

export const XIANGQI_NUM_PLANES = 14;

// Soldier, horse, elephant, advisor, chariot, cannon, general; red 0-6, black 7-13.
// H and E are the alternative horse and elephant letters some engines emit.
export const XIANGQI_PLANE_OF: Readonly<Record<string, number>> = {
  P: 0,
  N: 1,
  H: 1,
  B: 2,
  E: 2,
  A: 3,
  R: 4,
  C: 5,
  K: 6,
  p: 7,
  n: 8,
  h: 8,
  b: 9,
  e: 9,
  a: 10,
  r: 11,
  c: 12,
  k: 13,
};

export function xiangqiObservation(fen: string): Observation {
  const placement = fen.split(" ")[0] ?? "";
  return planesFromPlacement(
    placement,
    XIANGQI_PLANE_OF,
    createObservation(XIANGQI_NUM_PLANES, XIANGQI_GEOMETRY.height, XIANGQI_GEOMETRY.width),
  );
}

export function xiangqiSideLabel(side: Side): string {
  return side === "first" ? "red" : "black";
}

function repetitionKey(position: XiangqiPosition): string {
  return `${placementOf(position)} ${position.sideToMove}`;
}

/**
 * Xiangqi with the move generator in xiangqi-rules. A side with no legal
 * move loses; threefold repetition and bare generals are draws. Perpetual
 * check and chase are not adjudicated.
 */
export class XiangqiBoard implements GameBoard {
  readonly gameType = "xiangqi";
  readonly geometry = XIANGQI_GEOMETRY;
  readonly numPlanes = XIANGQI_NUM_PLANES;

  private position: XiangqiPosition;
  private history: Move[] = [];
  private seen = new Map<string, number>();
  private result: GameResult | null = null;

  constructor(fen: string = XIANGQI_START_FEN) {
    this.position = parseXiangqiFen(fen);
    this.record();
    this.result = this.evaluate();
  }

  get sideToMove(): Side {
    return this.position.sideToMove;
  }

  get moveHistory(): readonly Move[] {
    return this.history;
  }

  get fen(): string {
    return serializeXiangqiFen(this.position);
  }

  reset(): void {
    this.position = parseXiangqiFen(XIANGQI_START_FEN);
    this.history = [];
    this.seen.clear();
    this.record();
    this.result = null;
  }

  legalMoves(forPlayer?: Side): Move[] {
    if (this.result || (forPlayer !== undefined && forPlayer !== this.sideToMove)) {
      return [];
    }
    return generateLegalMoves(this.position).map(({ from, to }) => Move.of(from, to, XIANGQI_GEOMETRY));
  }

  applyMove(move: Move): MoveOutcome {
    if (!this.legalMoves().some((legal) => legal.equals(move))) {
      throw new IllegalMoveError(move.toNotation());
    }
    const mover = this.sideToMove;
    this.position = applyCellMove(this.position, { from: move.from, to: move.to });
    this.history.push(move);
    this.record();
    this.result = this.evaluate();
    return rewardFor(mover, this.result);
  }

  isGameOver(): boolean {
    return this.result !== null;
  }

  toObservation(): Observation {
    return xiangqiObservation(this.fen);
  }

  getStateHash(): string {
    return this.fen.split(" ").slice(0, 2).join(" ");
  }

  getResult(): GameResult | null {
    return this.result;
  }

  sideLabel(side: Side): string {
    return xiangqiSideLabel(side);
  }

  render(): string {
    return renderXiangqiBoard(this.fen);
  }

  private record(): void {
    const key = repetitionKey(this.position);
    this.seen.set(key, (this.seen.get(key) ?? 0) + 1);
  }

  private evaluate(): GameResult | null {
    const plyCount = this.history.length;
    if (generateLegalMoves(this.position).length === 0) {
      return {
        winner: opponentOf(this.position.sideToMove),
        terminationReason: isInCheck(this.position) ? "checkmate" : "stalemate",
        plyCount,
      };
    }
    if ((this.seen.get(repetitionKey(this.position)) ?? 0) >= 3) {
      return { winner: null, terminationReason: "threefold-repetition", plyCount };
    }
    if (!hasAttackingMaterial(this.position)) {
      return { winner: null, terminationReason: "insufficient-material", plyCount };
    }
    return null;
  }
}
