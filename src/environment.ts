import type { GameBoard } from "./board.js";
import { ChessBoard } from "./chess-board.js";
import { resolveEnvironmentOptions, type EnvironmentOptions } from "./config.js";
import { EnvironmentStateError, IllegalMoveError, InvalidActionError } from "./errors.js";
import type { Move } from "./move.js";
import { createRng, type Rng } from "./rng.js";
import { cellCount, type GameResult, type Logger, type Observation, type Reward } from "./types.js";
import { XiangqiBoard } from "./xiangqi-board.js";

export type EnvironmentStatus = "uninitialized" | "ready" | "terminated";

export type RenderMode = "human" | "ansi";

export interface StepInfo {
  legalActionIndices: number[];
  actionMask: Uint8Array;
  sideToMove: string;
  positionFingerprint: string;
  result?: GameResult;
}

export interface ResetResult {
  observation: Observation;
  info: StepInfo;
}

export interface StepResult {
  observation: Observation;
  reward: Reward;
  terminated: boolean;
  truncated: boolean;
  info: StepInfo;
}

/**
 * Gym-style episode wrapper around one board. Action `i` is the `i`-th move
 * of the board's current `legalMoves()`, so the mapping is rebuilt every
 * step; the fixed-width `actionMask` indexes `from * cells + to` instead.
 */
export class BoardEnvironment<B extends GameBoard = GameBoard> {
  readonly board: B;
  readonly maxSteps: number;

  private steps = 0;
  private state: EnvironmentStatus = "uninitialized";
  private random: Rng;
  private readonly logger: Logger;

  constructor(board: B, options?: EnvironmentOptions) {
    const resolved = resolveEnvironmentOptions(options);
    this.board = board;
    this.maxSteps = resolved.maxSteps;
    this.logger = resolved.logger;
    this.random = createRng(resolved.seed);
  }

  get stepsTaken(): number {
    return this.steps;
  }

  get status(): EnvironmentStatus {
    return this.state;
  }

  /** Auxiliary randomness only; move choice belongs to the caller. */
  get rng(): Rng {
    return this.random;
  }

  get actionSpaceSize(): number {
    const cells = cellCount(this.board.geometry);
    return cells * cells;
  }

  reset(seed?: number): ResetResult {
    if (seed !== undefined) {
      this.seed(seed);
    }
    this.board.reset();
    this.steps = 0;
    this.state = "ready";
    return { observation: this.board.toObservation(), info: this.buildInfo() };
  }

  step(actionIndex: number): StepResult {
    if (this.state === "uninitialized") {
      throw new EnvironmentStateError("Call reset() before step().");
    }
    const move = this.actionIndexToMove(actionIndex);
    const { reward, done } = this.board.applyMove(move);
    this.steps += 1;
    if (done) {
      this.state = "terminated";
    }

    const info = this.buildInfo();
    if (done) {
      const result = this.board.getResult();
      if (result) {
        info.result = result;
      }
    }
    return {
      observation: this.board.toObservation(),
      reward,
      terminated: done,
      truncated: this.steps >= this.maxSteps,
      info,
    };
  }

  actionMask(): Uint8Array {
    const cells = cellCount(this.board.geometry);
    const mask = new Uint8Array(cells * cells);
    for (const move of this.board.legalMoves()) {
      mask[move.from * cells + move.to] = 1;
    }
    return mask;
  }

  moveToActionIndex(move: Move): number {
    const index = this.board.legalMoves().findIndex((legal) => legal.equals(move));
    if (index < 0) {
      throw new IllegalMoveError(move.toNotation(), `Move ${move.toNotation()} is not legal in the current position.`);
    }
    return index;
  }

  actionIndexToMove(index: number): Move {
    const legal = this.board.legalMoves();
    const move = Number.isInteger(index) ? legal[index] : undefined;
    if (!move) {
      throw new InvalidActionError(index, legal.length);
    }
    return move;
  }

  /** Returns the board text; `human` also writes it to the logger. */
  render(mode: RenderMode = "human"): string {
    const text = this.board.render();
    if (mode === "human") {
      this.logger.info(text);
    }
    return text;
  }

  close(): void {
    // Nothing is held open.
  }

  seed(seed?: number): void {
    this.random = createRng(seed);
  }

  private buildInfo(): StepInfo {
    const legal = this.board.legalMoves();
    return {
      legalActionIndices: legal.map((_, index) => index),
      actionMask: this.actionMask(),
      sideToMove: this.board.sideLabel(this.board.sideToMove),
      positionFingerprint: this.board.getStateHash(),
    };
  }
}

export class ChessEnvironment extends BoardEnvironment<ChessBoard> {
  constructor(options?: EnvironmentOptions, board: ChessBoard = new ChessBoard()) {
    super(board, options);
  }
}

export class XiangqiEnvironment extends BoardEnvironment {
  constructor(options?: EnvironmentOptions, board: GameBoard = new XiangqiBoard()) {
    super(board, options);
  }
}
