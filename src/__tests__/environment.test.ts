import { describe, expect, it, vi } from "vitest";
import { ChessBoard } from "../chess-board.js";
import { DEFAULT_MAX_STEPS, resolveEnvironmentOptions } from "../config.js";
import { ChessEnvironment, XiangqiEnvironment, type BoardEnvironment } from "../environment.js";
import { EnvironmentStateError, IllegalMoveError, InvalidActionError, InvalidConfigError } from "../errors.js";
import { Move } from "../move.js";
import type { Logger } from "../types.js";

function quietLogger() {
  return { info: vi.fn(), warn: vi.fn() } satisfies Logger;
}

function stepNotation(env: BoardEnvironment, notation: string) {
  const move = Move.fromUciLike(notation, env.board.geometry);
  return env.step(env.moveToActionIndex(move));
}

function maskedPairs(mask: Uint8Array): number[] {
  const pairs: number[] = [];
  mask.forEach((value, index) => {
    if (value === 1) {
      pairs.push(index);
    }
  });
  return pairs;
}

function expectMaskMatchesLegalMoves(env: BoardEnvironment): void {
  const cells = env.board.geometry.width * env.board.geometry.height;
  const expected = [...new Set(env.board.legalMoves().map((move) => move.from * cells + move.to))].sort((a, b) => a - b);
  expect(maskedPairs(env.actionMask())).toEqual(expected);
}

// =============================================================================
// Configuration
// =============================================================================

describe("resolveEnvironmentOptions", () => {
  it("fills in defaults", () => {
    const resolved = resolveEnvironmentOptions();
    expect(resolved.maxSteps).toBe(DEFAULT_MAX_STEPS);
    expect(resolved.seed).toBeUndefined();
  });

  it.each([0, -3, 2.5])("rejects maxSteps %s", (maxSteps) => {
    expect(() => new ChessEnvironment({ maxSteps })).toThrow(InvalidConfigError);
  });

  it("lists each problem", () => {
    try {
      resolveEnvironmentOptions({ maxSteps: 0, seed: 1.5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (error instanceof InvalidConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^maxSteps: /);
        expect(error.issues[1]).toMatch(/^seed: /);
      }
    }
  });
});

// =============================================================================
// Chess episodes
// =============================================================================

describe("ChessEnvironment", () => {
  it("refuses to step before reset", () => {
    const env = new ChessEnvironment();
    expect(env.status).toBe("uninitialized");
    expect(() => env.step(0)).toThrow(EnvironmentStateError);
  });

  it("resets to the start position", () => {
    const env = new ChessEnvironment();
    const { observation, info } = env.reset();

    expect(observation.shape).toEqual([12, 8, 8]);
    expect(info.legalActionIndices).toEqual(Array.from({ length: 20 }, (_, index) => index));
    expect(info.actionMask).toHaveLength(4096);
    expect(maskedPairs(info.actionMask)).toHaveLength(20);
    expect(info.sideToMove).toBe("white");
    expect(info.positionFingerprint).toBe(env.board.getStateHash());
    expect(info.result).toBeUndefined();
    expect(env.status).toBe("ready");
    expect(env.actionSpaceSize).toBe(4096);
  });

  it("steps one ply at a time", () => {
    const env = new ChessEnvironment();
    env.reset();

    const step = stepNotation(env, "e2e4");

    expect(step.reward).toBe(0);
    expect(step.terminated).toBe(false);
    expect(step.truncated).toBe(false);
    expect(step.info.sideToMove).toBe("black");
    expect(env.stepsTaken).toBe(1);
  });

  it.each([-1, 20, 1.5, Number.NaN])("rejects action index %s", (action) => {
    const env = new ChessEnvironment();
    env.reset();

    expect(() => env.step(action)).toThrow(InvalidActionError);
    expect(env.stepsTaken).toBe(0);
    expect(env.board.moveHistory).toHaveLength(0);
  });

  it("rejects an illegal move when mapping to an index", () => {
    const env = new ChessEnvironment();
    env.reset();
    expect(() => env.moveToActionIndex(Move.fromUciLike("e2e5"))).toThrow(IllegalMoveError);
  });

  it("maps legal moves and action indices both ways", () => {
    const env = new ChessEnvironment();
    env.reset();
    stepNotation(env, "d2d4");

    env.board.legalMoves().forEach((move, index) => {
      expect(env.moveToActionIndex(move)).toBe(index);
      expect(env.actionIndexToMove(index).equals(move)).toBe(true);
    });
  });

  it("keeps the action mask in step with the legal moves", () => {
    const env = new ChessEnvironment();
    env.reset();
    for (const notation of ["e2e4", "d7d5", "e4d5", "d8d5"]) {
      expectMaskMatchesLegalMoves(env);
      stepNotation(env, notation);
    }
    expectMaskMatchesLegalMoves(env);
  });

  it("truncates at maxSteps", () => {
    const env = new ChessEnvironment({ maxSteps: 5 });
    env.reset();

    const truncated: boolean[] = [];
    for (let i = 0; i < 5; i += 1) {
      const step = env.step(0);
      truncated.push(step.truncated);
      expect(step.terminated).toBe(false);
    }

    expect(truncated).toEqual([false, false, false, false, true]);
  });

  it("terminates on checkmate and reports the result", () => {
    const env = new ChessEnvironment();
    env.reset();

    stepNotation(env, "f2f3");
    stepNotation(env, "e7e5");
    stepNotation(env, "g2g4");
    const step = stepNotation(env, "d8h4");

    expect(step.reward).toBe(1);
    expect(step.terminated).toBe(true);
    expect(step.info.result).toEqual({ winner: "second", terminationReason: "checkmate", plyCount: 4 });
    expect(step.info.legalActionIndices).toEqual([]);
    expect(maskedPairs(step.info.actionMask)).toEqual([]);
    expect(env.status).toBe("terminated");
    expect(() => env.step(0)).toThrow(InvalidActionError);
  });

  it("resets a board built from a custom position to the standard start", () => {
    const env = new ChessEnvironment({}, new ChessBoard("rnbqkbnr/pppp1ppp/8/4p3/2B1P3/5Q2/PPPP1PPP/RNB1K1NR w KQkq - 3 3"));
    env.reset();
    expect(env.stepsTaken).toBe(0);
    expect(env.board.legalMoves()).toHaveLength(20);
  });

  it("reproduces its random stream from a seed", () => {
    const a = new ChessEnvironment();
    const b = new ChessEnvironment({ seed: 11 });
    a.reset(11);
    b.reset();

    const draws = (env: ChessEnvironment): number[] => Array.from({ length: 5 }, () => env.rng.nextInt(1000));
    expect(draws(a)).toEqual(draws(b));
  });

  it("does not touch the board when reseeded or closed", () => {
    const env = new ChessEnvironment();
    env.reset();
    stepNotation(env, "e2e4");
    const before = env.board.getStateHash();

    env.seed(3);
    env.close();

    expect(env.board.getStateHash()).toBe(before);
    expect(env.stepsTaken).toBe(1);
  });

  it("renders to the logger in human mode only", () => {
    const logger = quietLogger();
    const env = new ChessEnvironment({ logger });
    env.reset();

    const text = env.render("ansi");
    expect(text).toBe(env.board.render());
    expect(logger.info).not.toHaveBeenCalled();

    env.render();
    expect(logger.info).toHaveBeenCalledWith(text);
  });
});

// =============================================================================
// Xiangqi episodes
// =============================================================================

describe("XiangqiEnvironment", () => {
  it("exposes a 90 x 90 action mask", () => {
    const env = new XiangqiEnvironment();
    const { observation, info } = env.reset();

    expect(observation.shape).toEqual([14, 10, 9]);
    expect(info.actionMask).toHaveLength(8100);
    expect(maskedPairs(info.actionMask)).toHaveLength(44);
    expect(info.legalActionIndices).toHaveLength(44);
    expect(info.sideToMove).toBe("red");
  });

  it("alternates sides across steps", () => {
    const env = new XiangqiEnvironment();
    env.reset();

    const sides = ["h3e3", "h8e8", "b1c3"].map((notation) => stepNotation(env, notation).info.sideToMove);

    expect(sides).toEqual(["black", "red", "black"]);
    expectMaskMatchesLegalMoves(env);
  });
});
