export * from "./types.js";
export * from "./errors.js";

export { Move, cellToSquare, isCellOnBoard } from "./move.js";
export { createObservation, markCell, observationSum, planesFromPlacement, valueAt } from "./observation.js";
export { type GameBoard, rewardFor } from "./board.js";

export { ChessBoard } from "./chess-board.js";
export { XiangqiBoard, XIANGQI_NUM_PLANES, XIANGQI_PLANE_OF, xiangqiObservation } from "./xiangqi-board.js";
export { XiangqiOracleBoard, type XiangqiOracleBoardOptions } from "./xiangqi-oracle-board.js";
export { SimpleXiangqiBoard } from "./simple-xiangqi-board.js";
export {
  XIANGQI_START_FEN,
  applyCellMove,
  generateLegalMoves,
  isInCheck,
  parseXiangqiFen,
  serializeXiangqiFen,
  type CellMove,
  type XiangqiPiece,
  type XiangqiPieceKind,
  type XiangqiPosition,
} from "./xiangqi-rules.js";
export { NativeXiangqiOracle, OracleAdapter, type RulesOracle } from "./rules-oracle.js";

export { GAME_TYPES, createBoard, createEnvironment, parseGameType, type BoardFactoryOptions } from "./board-factory.js";
export {
  BoardEnvironment,
  ChessEnvironment,
  XiangqiEnvironment,
  type EnvironmentStatus,
  type RenderMode,
  type ResetResult,
  type StepInfo,
  type StepResult,
} from "./environment.js";
export { DEFAULT_MAX_STEPS, environmentOptionsSchema, resolveEnvironmentOptions, type EnvironmentOptions } from "./config.js";
export { createRng, type Rng } from "./rng.js";
export { playRandomEpisode, type EpisodeSummary, type SelfPlayOptions } from "./self-play.js";
export { renderChessBoard, renderXiangqiBoard, type XiangqiRenderOptions } from "./board-render.js";
