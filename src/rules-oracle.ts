import { z } from "zod";
import { IllegalMoveError, OracleCommunicationError, UnsupportedGameTypeError, describeError } from "./errors.js";
import { Move, cellToSquare } from "./move.js";
import { XIANGQI_GEOMETRY, type Logger, type Side } from "./types.js";
import {
  XIANGQI_START_FEN,
  applyCellMove,
  generateLegalMoves,
  parseXiangqiFen,
  serializeXiangqiFen,
  type XiangqiPosition,
} from "./xiangqi-rules.js";

/**
 * External rules backend, treated as a pure function of
 * `(variant, position, moves)`. Some backends only take the two-argument
 * form of `legalMoves`; the adapter copes with both.
 */
export interface RulesOracle {
  startPosition(variant: string): unknown;
  legalMoves(variant: string, position: string, moves?: readonly string[]): unknown;
  nextPosition(variant: string, position: string, moves?: readonly string[]): unknown;
}

const positionSchema = z
  .string()
  .trim()
  .regex(/^\S+ [wrb](?: .*)?$/, "expected '<placement> <side> ...'")
  .superRefine((position, ctx) => {
    try {
      parseXiangqiFen(position);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
    }
  });

const legalMovesSchema = z.array(z.string().min(4));

function parsePosition(raw: unknown, operation: string): string {
  const parsed = positionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new OracleCommunicationError(
      `Oracle ${operation} returned a malformed position: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
    );
  }
  return parsed.data;
}

export function sideToMoveOf(position: string): Side {
  return position.split(" ")[1] === "b" ? "second" : "first";
}

/** Position fields only: placement and side to move. */
export function positionFingerprint(position: string): string {
  return position.split(" ").slice(0, 2).join(" ");
}

export class OracleAdapter {
  readonly variant: string;
  private readonly oracle: RulesOracle;
  private readonly logger: Logger;

  constructor(oracle: RulesOracle, variant: string, logger: Logger = console) {
    this.oracle = oracle;
    this.variant = variant;
    this.logger = logger;
  }

  startPosition(): string {
    let raw: unknown;
    try {
      raw = this.oracle.startPosition(this.variant);
    } catch (error) {
      throw new OracleCommunicationError(`Oracle could not provide a start position for ${this.variant}.`, {
        cause: error,
      });
    }
    return parsePosition(raw, "startPosition");
  }

  /** Read path: any oracle failure degrades to "no legal moves". */
  legalMoves(position: string): Move[] {
    try {
      const raw = this.legalMovesWithFallback(position);
      const parsed = legalMovesSchema.safeParse(raw);
      if (!parsed.success) {
        throw new OracleCommunicationError(`Oracle legalMoves returned malformed data for '${position}'.`);
      }
      return parsed.data.map((token) => this.toMove(token));
    } catch (error) {
      this.logger.warn(`Legal move lookup failed for '${position}': ${describeError(error)}`);
      return [];
    }
  }

  /** Write path: failures surface as IllegalMoveError carrying the oracle error. */
  nextPosition(position: string, notation: string): string {
    try {
      const raw = this.oracle.nextPosition(this.variant, position, [notation]);
      return parsePosition(raw, "nextPosition");
    } catch (error) {
      const cause =
        error instanceof OracleCommunicationError
          ? error
          : new OracleCommunicationError(`Oracle rejected '${notation}': ${describeError(error)}`, { cause: error });
      throw new IllegalMoveError(notation, `Could not apply '${notation}': ${cause.message}`, { cause });
    }
  }

  private toMove(token: string): Move {
    try {
      return Move.fromBackendToken(token, XIANGQI_GEOMETRY);
    } catch (error) {
      throw new OracleCommunicationError(`Oracle issued unreadable move '${token}'.`, { cause: error });
    }
  }

  private legalMovesWithFallback(position: string): unknown {
    try {
      return this.oracle.legalMoves(this.variant, position, []);
    } catch (richError) {
      try {
        return this.oracle.legalMoves(this.variant, position);
      } catch {
        throw richError;
      }
    }
  }
}

/** In-process oracle over the native Xiangqi move generator. */
export class NativeXiangqiOracle implements RulesOracle {
  startPosition(variant: string): string {
    this.ensureVariant(variant);
    return XIANGQI_START_FEN;
  }

  legalMoves(variant: string, position: string, moves: readonly string[] = []): string[] {
    this.ensureVariant(variant);
    const current = this.replay(position, moves);
    return generateLegalMoves(current).map(
      ({ from, to }) => cellToSquare(from, XIANGQI_GEOMETRY) + cellToSquare(to, XIANGQI_GEOMETRY),
    );
  }

  nextPosition(variant: string, position: string, moves: readonly string[] = []): string {
    this.ensureVariant(variant);
    return serializeXiangqiFen(this.replay(position, moves));
  }

  private ensureVariant(variant: string): void {
    if (variant !== "xiangqi") {
      throw new UnsupportedGameTypeError(variant);
    }
  }

  private replay(position: string, moves: readonly string[]): XiangqiPosition {
    let current = parseXiangqiFen(position);
    for (const notation of moves) {
      const move = Move.fromUciLike(notation, XIANGQI_GEOMETRY);
      const legal = generateLegalMoves(current).some(({ from, to }) => from === move.from && to === move.to);
      if (!legal) {
        throw new IllegalMoveError(notation);
      }
      current = applyCellMove(current, { from: move.from, to: move.to });
    }
    return current;
  }
}
