import { Chess } from "chess.js";
import type { GameBoard } from "./board.js";
import { rewardFor } from "./board.js";
import { renderChessBoard } from "./board-render.js";
import { IllegalMoveError, ParseError, describeError } from "./errors.js";
import { Move, cellToSquare } from "./move.js";
import { createObservation, planesFromPlacement } from "./observation.js";
import { CHESS_GEOMETRY, type GameResult, type MoveOutcome, type Observation, type Side } from "./types.js";

// 6 piece kinds x 2 colours, white first.
const PLANE_OF: Readonly<Record<string, number>> = {
  P: 0,
  N: 1,
  B: 2,
  R: 3,
  Q: 4,
  K: 5,
  p: 6,
  n: 7,
  b: 8,
  r: 9,
  q: 10,
  k: 11,
};

const NUM_PLANES = 12;

function sideFromTurn(turn: "w" | "b"): Side {
  return turn === "w" ? "first" : "second";
}

function squareToCell(square: string): number {
  return (Number.parseInt(square.slice(1), 10) - 1) * CHESS_GEOMETRY.width + (square.charCodeAt(0) - 97);
}

function evaluateResult(chess: Chess, plyCount: number): GameResult | null {
  if (chess.isCheckmate()) {
    const loser = sideFromTurn(chess.turn());
    return {
      winner: loser === "first" ? "second" : "first",
      terminationReason: "checkmate",
      plyCount,
    };
  }
  if (chess.isStalemate()) {
    return { winner: null, terminationReason: "stalemate", plyCount };
  }
  if (chess.isInsufficientMaterial()) {
    return { winner: null, terminationReason: "insufficient-material", plyCount };
  }
  if (chess.isThreefoldRepetition()) {
    return { winner: null, terminationReason: "threefold-repetition", plyCount };
  }
  if (chess.isDrawByFiftyMoves()) {
    return { winner: null, terminationReason: "fifty-move-rule", plyCount };
  }
  if (chess.isDraw()) {
    return { winner: null, terminationReason: "draw", plyCount };
  }
  return null;
}

/**
 * Standard chess on chess.js. Observation row 0 is rank 8, so the tensor
 * reads the way a diagram does from white's side.
 */
export class ChessBoard implements GameBoard {
  readonly gameType = "chess";
  readonly geometry = CHESS_GEOMETRY;
  readonly numPlanes = NUM_PLANES;

  private chess: Chess;
  private history: Move[] = [];
  private result: GameResult | null;

  constructor(fen?: string) {
    this.chess = ChessBoard.load(fen);
    this.result = evaluateResult(this.chess, 0);
  }

  private static load(fen: string | undefined): Chess {
    if (fen === undefined) {
      return new Chess();
    }
    try {
      return new Chess(fen);
    } catch (error) {
      throw new ParseError(`Invalid FEN '${fen}': ${describeError(error)}`);
    }
  }

  get sideToMove(): Side {
    return sideFromTurn(this.chess.turn());
  }

  get moveHistory(): readonly Move[] {
    return this.history;
  }

  get fen(): string {
    return this.chess.fen();
  }

  reset(): void {
    this.chess.reset();
    this.history = [];
    this.result = null;
  }

  legalMoves(forPlayer?: Side): Move[] {
    if (this.result || (forPlayer !== undefined && forPlayer !== this.sideToMove)) {
      return [];
    }
    return this.chess
      .moves({ verbose: true })
      .map((move) => Move.of(squareToCell(move.from), squareToCell(move.to), CHESS_GEOMETRY, move.promotion));
  }

  applyMove(move: Move): MoveOutcome {
    if (!this.legalMoves().some((legal) => legal.equals(move))) {
      throw new IllegalMoveError(move.toNotation());
    }
    const mover = this.sideToMove;
    this.chess.move({
      from: cellToSquare(move.from, CHESS_GEOMETRY),
      to: cellToSquare(move.to, CHESS_GEOMETRY),
      promotion: move.promotion ?? undefined,
    });
    this.history.push(move);
    this.result = evaluateResult(this.chess, this.history.length);
    return rewardFor(mover, this.result);
  }

  isGameOver(): boolean {
    return this.result !== null;
  }

  toObservation(): Observation {
    const placement = this.chess.fen().split(" ")[0] ?? "";
    return planesFromPlacement(placement, PLANE_OF, createObservation(NUM_PLANES, 8, 8));
  }

  /** Placement, side to move, castling rights and en-passant square; clocks are left out. */
  getStateHash(): string {
    return this.chess.fen().split(" ").slice(0, 4).join(" ");
  }

  getResult(): GameResult | null {
    return this.result;
  }

  sideLabel(side: Side): string {
    return side === "first" ? "white" : "black";
  }

  render(): string {
    return renderChessBoard(this.chess.fen());
  }
}
