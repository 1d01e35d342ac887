import type { GameBoard } from "./board.js";
import { renderXiangqiBoard } from "./board-render.js";
import { IllegalMoveError } from "./errors.js";
import type { Move } from "./move.js";
import { OracleAdapter, positionFingerprint, sideToMoveOf, type RulesOracle } from "./rules-oracle.js";
import { XIANGQI_GEOMETRY, opponentOf, type GameResult, type Logger, type MoveOutcome, type Observation, type Side } from "./types.js";
import { XIANGQI_NUM_PLANES, xiangqiObservation, xiangqiSideLabel } from "./xiangqi-board.js";

/**
 * Oracle-backed Xiangqi that works in notation strings and keeps no cached
 * result: every question is asked of the oracle again.
 */
export class SimpleXiangqiBoard implements GameBoard {
  readonly gameType = "xiangqi_simple";
  readonly geometry = XIANGQI_GEOMETRY;
  readonly numPlanes = XIANGQI_NUM_PLANES;

  private readonly adapter: OracleAdapter;
  private position: string;
  private history: Move[] = [];

  constructor(oracle: RulesOracle, logger?: Logger) {
    this.adapter = new OracleAdapter(oracle, "xiangqi", logger);
    this.position = this.adapter.startPosition();
  }

  get sideToMove(): Side {
    return sideToMoveOf(this.position);
  }

  get moveHistory(): readonly Move[] {
    return this.history;
  }

  get fen(): string {
    return this.position;
  }

  reset(): void {
    this.position = this.adapter.startPosition();
    this.history = [];
  }

  legalNotations(): string[] {
    return this.adapter.legalMoves(this.position).map((move) => move.toNotation());
  }

  makeMove(notation: string): MoveOutcome {
    const move = this.adapter.legalMoves(this.position).find((candidate) => candidate.toNotation() === notation);
    if (!move) {
      throw new IllegalMoveError(notation);
    }
    this.position = this.adapter.nextPosition(this.position, notation);
    this.history.push(move);
    const done = this.isGameOver();
    return { reward: done ? 1 : 0, done };
  }

  legalMoves(forPlayer?: Side): Move[] {
    if (forPlayer !== undefined && forPlayer !== this.sideToMove) {
      return [];
    }
    return this.adapter.legalMoves(this.position);
  }

  applyMove(move: Move): MoveOutcome {
    const legal = this.adapter.legalMoves(this.position).find((candidate) => candidate.equals(move));
    if (!legal) {
      throw new IllegalMoveError(move.toNotation());
    }
    return this.makeMove(legal.toNotation());
  }

  isGameOver(): boolean {
    return this.adapter.legalMoves(this.position).length === 0;
  }

  toObservation(): Observation {
    return xiangqiObservation(this.position);
  }

  getStateHash(): string {
    return positionFingerprint(this.position);
  }

  getResult(): GameResult | null {
    if (!this.isGameOver()) {
      return null;
    }
    return {
      winner: opponentOf(this.sideToMove),
      terminationReason: "no-legal-moves",
      plyCount: this.history.length,
    };
  }

  sideLabel(side: Side): string {
    return xiangqiSideLabel(side);
  }

  render(): string {
    return renderXiangqiBoard(this.position);
  }
}
