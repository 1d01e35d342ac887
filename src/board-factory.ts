import type { GameBoard } from "./board.js";
import { ChessBoard } from "./chess-board.js";
import type { EnvironmentOptions } from "./config.js";
import { BoardEnvironment, ChessEnvironment, XiangqiEnvironment } from "./environment.js";
import { UnsupportedGameTypeError } from "./errors.js";
import { NativeXiangqiOracle, type RulesOracle } from "./rules-oracle.js";
import { SimpleXiangqiBoard } from "./simple-xiangqi-board.js";
import type { GameType, Logger } from "./types.js";
import { XiangqiBoard } from "./xiangqi-board.js";
import { XiangqiOracleBoard } from "./xiangqi-oracle-board.js";

export const GAME_TYPES: readonly GameType[] = ["chess", "xiangqi", "xiangqi_oracle", "xiangqi_simple"];

export interface BoardFactoryOptions {
  /** Rules backend for the oracle-backed variants; defaults to the native engine. */
  oracle?: RulesOracle;
  logger?: Logger;
}

export function parseGameType(value: string): GameType {
  const normalized = value.trim().toLowerCase();
  const match = GAME_TYPES.find((gameType) => gameType === normalized);
  if (!match) {
    throw new UnsupportedGameTypeError(value);
  }
  return match;
}

export function createBoard(gameType: string, options: BoardFactoryOptions = {}): GameBoard {
  const type = parseGameType(gameType);
  switch (type) {
    case "chess":
      return new ChessBoard();
    case "xiangqi":
      return new XiangqiBoard();
    case "xiangqi_oracle":
      return new XiangqiOracleBoard({ oracle: options.oracle ?? new NativeXiangqiOracle(), logger: options.logger });
    case "xiangqi_simple":
      return new SimpleXiangqiBoard(options.oracle ?? new NativeXiangqiOracle(), options.logger);
  }
}

export function createEnvironment(
  gameType: string,
  options: EnvironmentOptions & BoardFactoryOptions = {},
): BoardEnvironment {
  const board = createBoard(gameType, options);
  if (board instanceof ChessBoard) {
    return new ChessEnvironment(options, board);
  }
  return new XiangqiEnvironment(options, board);
}
