import type { Move } from "./move.js";
import type { BoardGeometry, GameResult, GameType, MoveOutcome, Observation, Side } from "./types.js";

/**
 * Position state of one game. Every rules backend implements this directly;
 * callers never switch on the concrete class.
 */
export interface GameBoard<M extends Move = Move> {
  readonly gameType: GameType;
  readonly geometry: BoardGeometry;
  readonly numPlanes: number;
  readonly sideToMove: Side;
  readonly moveHistory: readonly M[];

  /** Standard start position, empty history, no result, first player to move. */
  reset(): void;

  /**
   * Moves for the side to move, in a fixed order for a fixed position. Empty
   * when `forPlayer` is not the side to move or the game is over.
   */
  legalMoves(forPlayer?: Side): M[];

  /** Throws IllegalMoveError, leaving the board untouched, for any move outside `legalMoves()`. */
  applyMove(move: M): MoveOutcome;

  isGameOver(): boolean;
  toObservation(): Observation;
  getStateHash(): string;
  getResult(): GameResult | null;

  sideLabel(side: Side): string;
  render(): string;
}

export function rewardFor(mover: Side, result: GameResult | null): MoveOutcome {
  if (!result) {
    return { reward: 0, done: false };
  }
  if (result.winner === null) {
    return { reward: 0, done: true };
  }
  return { reward: result.winner === mover ? 1 : -1, done: true };
}
