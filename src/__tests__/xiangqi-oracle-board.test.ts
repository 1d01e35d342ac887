import { describe, expect, it, vi } from "vitest";
import { XiangqiEnvironment } from "../environment.js";
import { IllegalMoveError, ParseError } from "../errors.js";
import { Move } from "../move.js";
import { observationSum } from "../observation.js";
import { NativeXiangqiOracle, type RulesOracle } from "../rules-oracle.js";
import { SimpleXiangqiBoard } from "../simple-xiangqi-board.js";
import { XIANGQI_GEOMETRY, type Logger } from "../types.js";
import { XiangqiBoard } from "../xiangqi-board.js";
import { XiangqiOracleBoard } from "../xiangqi-oracle-board.js";

const MATE_IN_ONE = "4k4/8R/R8/9/9/9/9/9/9/3K5 w - - 0 1";
const ALTERNATE_LETTERS = "rheakaehr/9/1c5c1/p1p1p1p1p/9/9/P1P1P1P1P/1C5C1/9/RHEAKAEHR w - - 0 1";
const AFTER_CENTRAL_CANNON = "rnbakabnr/9/1c5c1/p1p1p1p1p/9/9/P1P1P1P1P/1C2C4/9/RNBAKABNR b - - 1 1";

function quietLogger() {
  return { info: vi.fn(), warn: vi.fn() } satisfies Logger;
}

function oracleWith(overrides: Partial<RulesOracle>): RulesOracle {
  const native = new NativeXiangqiOracle();
  return {
    startPosition: (variant) => native.startPosition(variant),
    legalMoves: (variant, position, moves) => native.legalMoves(variant, position, moves),
    nextPosition: (variant, position, moves) => native.nextPosition(variant, position, moves),
    ...overrides,
  };
}

function xq(text: string): Move {
  return Move.fromUciLike(text, XIANGQI_GEOMETRY);
}

// =============================================================================
// XiangqiOracleBoard
// =============================================================================

describe("XiangqiOracleBoard", () => {
  it("starts from the oracle's start position", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle() });
    expect(board.sideToMove).toBe("first");
    expect(board.legalMoves()).toHaveLength(44);
    expect(board.getStateHash()).toBe("rnbakabnr/9/1c5c1/p1p1p1p1p/9/9/P1P1P1P1P/1C5C1/9/RNBAKABNR w");
  });

  it("accepts a parsed move and records the oracle's own move", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle() });

    expect(board.applyMove(xq("h3e3"))).toEqual({ reward: 0, done: false });
    expect(board.fen).toBe(AFTER_CENTRAL_CANNON);
    expect(board.moveHistory[0]?.backendToken).toBe("h3e3");
    expect(board.sideToMove).toBe("second");
  });

  it("matches the native board's observation", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle() });
    expect(board.toObservation()).toEqual(new XiangqiBoard().toObservation());
  });

  it("ends the game when the opponent has no legal move", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle(), fen: MATE_IN_ONE });

    expect(board.applyMove(xq("a8a10"))).toEqual({ reward: 1, done: true });
    expect(board.getResult()).toEqual({ winner: "first", terminationReason: "no-legal-moves", plyCount: 1 });
    expect(board.legalMoves()).toEqual([]);
  });

  it("rejects a move the oracle does not list", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle() });
    expect(() => board.applyMove(xq("e1e3"))).toThrow(IllegalMoveError);
    expect(board.moveHistory).toHaveLength(0);
  });

  it("leaves the board untouched when the oracle fails to apply a move", () => {
    const oracle = oracleWith({
      nextPosition: () => {
        throw new Error("engine crashed");
      },
    });
    const board = new XiangqiOracleBoard({ oracle, logger: quietLogger() });
    const before = board.getStateHash();

    expect(() => board.applyMove(xq("h3e3"))).toThrow(IllegalMoveError);
    expect(board.getStateHash()).toBe(before);
    expect(board.moveHistory).toHaveLength(0);
  });

  it("treats a failing legal-move lookup as a position with no moves", () => {
    const logger = quietLogger();
    const oracle = oracleWith({
      legalMoves: () => {
        throw new Error("engine crashed");
      },
    });
    const board = new XiangqiOracleBoard({ oracle, logger });

    expect(board.isGameOver()).toBe(true);
    expect(board.getResult()).toEqual({ winner: "second", terminationReason: "no-legal-moves", plyCount: 0 });
    expect(logger.warn).toHaveBeenCalled();
  });

  it.each([
    ["an unreadable placement", "xyz w"],
    ["an eleventh rank", "4k4/8R/R8/9/9/9/9/9/9/3K5/RRRRRRRRR w - - 0 1"],
  ])("rejects a starting FEN with %s", (_label, fen) => {
    expect(() => new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle(), fen })).toThrow(ParseError);
  });

  it("encodes H and E letters from the oracle like N and B", () => {
    const board = new XiangqiOracleBoard({ oracle: oracleWith({ startPosition: () => ALTERNATE_LETTERS }) });

    expect(board.legalMoves()).toHaveLength(44);
    expect(observationSum(board.toObservation())).toBe(32);
    expect(board.toObservation()).toEqual(new XiangqiBoard().toObservation());
  });

  it("round-trips every legal move through its notation", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle() });
    for (const move of board.legalMoves()) {
      const parsed = xq(move.toNotation());
      expect(parsed.equals(move)).toBe(true);
      expect(parsed.key()).toBe(move.key());
    }
  });

  it("maps every legal move to an action index and back", () => {
    const env = new XiangqiEnvironment({}, new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle() }));
    env.reset();
    env.step(env.moveToActionIndex(xq("b3b10")));

    env.board.legalMoves().forEach((move, index) => {
      expect(env.moveToActionIndex(move)).toBe(index);
      expect(env.actionIndexToMove(index).equals(move)).toBe(true);
    });
  });

  it("resets to the oracle's start position", () => {
    const board = new XiangqiOracleBoard({ oracle: new NativeXiangqiOracle(), fen: MATE_IN_ONE });
    board.applyMove(xq("a8a10"));

    board.reset();

    expect(board.getResult()).toBeNull();
    expect(board.legalMoves()).toHaveLength(44);
    expect(board.moveHistory).toHaveLength(0);
  });
});

// =============================================================================
// SimpleXiangqiBoard
// =============================================================================

describe("SimpleXiangqiBoard", () => {
  it("works in notation strings", () => {
    const board = new SimpleXiangqiBoard(new NativeXiangqiOracle());
    expect(board.legalNotations()).toHaveLength(44);
    expect(board.legalNotations()).toContain("h3e3");

    expect(board.makeMove("h3e3")).toEqual({ reward: 0, done: false });
    expect(board.fen).toBe(AFTER_CENTRAL_CANNON);
    expect(board.sideToMove).toBe("second");
    expect(board.getResult()).toBeNull();
  });

  it("rejects notation the oracle does not list", () => {
    const board = new SimpleXiangqiBoard(new NativeXiangqiOracle());
    expect(() => board.makeMove("e1e3")).toThrow(IllegalMoveError);
    expect(board.moveHistory).toHaveLength(0);
  });

  it("applies Move objects through their notation", () => {
    const board = new SimpleXiangqiBoard(new NativeXiangqiOracle());
    board.applyMove(xq("b1c3"));
    expect(board.moveHistory.map((move) => move.toNotation())).toEqual(["b1c3"]);
    expect(board.legalMoves("first")).toEqual([]);
    expect(board.legalMoves("second")).toHaveLength(board.legalMoves().length);
  });

  it("applies a legal move whatever case the oracle writes its tokens in", () => {
    const native = new NativeXiangqiOracle();
    const oracle = oracleWith({
      legalMoves: (variant, position, moves) =>
        native.legalMoves(variant, position, moves).map((token) => token.toUpperCase()),
      nextPosition: (variant, position, moves) =>
        native.nextPosition(variant, position, moves?.map((token) => token.toLowerCase())),
    });
    const board = new SimpleXiangqiBoard(oracle);

    expect(board.applyMove(xq("h3e3"))).toEqual({ reward: 0, done: false });
    expect(board.moveHistory[0]?.backendToken).toBe("H3E3");
    expect(board.fen).toBe(AFTER_CENTRAL_CANNON);
  });

  it("asks the oracle again on every question", () => {
    const legalMoves = vi.fn((variant: string, position: string, moves?: readonly string[]) =>
      new NativeXiangqiOracle().legalMoves(variant, position, moves),
    );
    const board = new SimpleXiangqiBoard(oracleWith({ legalMoves }));

    board.isGameOver();
    board.isGameOver();

    expect(legalMoves).toHaveBeenCalledTimes(2);
  });
});
