import type { GameBoard } from "./board.js";
import { rewardFor } from "./board.js";
import { renderXiangqiBoard } from "./board-render.js";
import { IllegalMoveError } from "./errors.js";
import type { Move } from "./move.js";
import { OracleAdapter, positionFingerprint, sideToMoveOf, type RulesOracle } from "./rules-oracle.js";
import { XIANGQI_GEOMETRY, opponentOf, type GameResult, type Logger, type MoveOutcome, type Observation, type Side } from "./types.js";
import { XIANGQI_NUM_PLANES, xiangqiObservation, xiangqiSideLabel } from "./xiangqi-board.js";
import { parseXiangqiFen, serializeXiangqiFen } from "./xiangqi-rules.js";

export interface XiangqiOracleBoardOptions {
  oracle: RulesOracle;
  fen?: string;
  logger?: Logger;
}

/**
 * Xiangqi whose rules live in an external oracle. The board only keeps the
 * oracle's position string; the game ends when the side to move has no
 * legal move, and the side that just moved takes the win.
 */
export class XiangqiOracleBoard implements GameBoard {
  readonly gameType = "xiangqi_oracle";
  readonly geometry = XIANGQI_GEOMETRY;
  readonly numPlanes = XIANGQI_NUM_PLANES;

  private readonly adapter: OracleAdapter;
  private position: string;
  private history: Move[] = [];
  private result: GameResult | null = null;

  constructor(options: XiangqiOracleBoardOptions) {
    this.adapter = new OracleAdapter(options.oracle, "xiangqi", options.logger);
    this.position =
      options.fen === undefined ? this.adapter.startPosition() : serializeXiangqiFen(parseXiangqiFen(options.fen));
    this.result = this.evaluate();
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
    this.result = null;
  }

  legalMoves(forPlayer?: Side): Move[] {
    if (this.result || (forPlayer !== undefined && forPlayer !== this.sideToMove)) {
      return [];
    }
    return this.adapter.legalMoves(this.position);
  }

  applyMove(move: Move): MoveOutcome {
    const notation = move.toNotation();
    const legal = this.legalMoves().find((candidate) => candidate.equals(move));
    if (!legal) {
      throw new IllegalMoveError(notation);
    }
    const mover = this.sideToMove;
    this.position = this.adapter.nextPosition(this.position, legal.toNotation());
    this.history.push(legal);
    this.result = this.evaluate();
    return rewardFor(mover, this.result);
  }

  isGameOver(): boolean {
    return this.result !== null;
  }

  toObservation(): Observation {
    return xiangqiObservation(this.position);
  }

  getStateHash(): string {
    return positionFingerprint(this.position);
  }

  getResult(): GameResult | null {
    return this.result;
  }

  sideLabel(side: Side): string {
    return xiangqiSideLabel(side);
  }

  render(): string {
    return renderXiangqiBoard(this.position);
  }

  private evaluate(): GameResult | null {
    if (this.adapter.legalMoves(this.position).length > 0) {
      return null;
    }
    return {
      winner: opponentOf(this.sideToMove),
      terminationReason: "no-legal-moves",
      plyCount: this.history.length,
    };
  }
}
