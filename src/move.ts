import { ParseError } from "./errors.js";
import { CHESS_GEOMETRY, type BoardGeometry } from "./types.js";

const UCI_LIKE = /^([a-z])(\d{1,2})([a-z])(\d{1,2})([a-z])?$/;

function squareToCell(file: string, rank: string, geometry: BoardGeometry, text: string): number {
  const col = file.charCodeAt(0) - 97;
  const rankNumber = Number.parseInt(rank, 10);
  if (col >= geometry.width || rankNumber < 1 || rankNumber > geometry.height || rank.startsWith("0")) {
    throw new ParseError(`Square '${file}${rank}' in '${text}' is off the ${geometry.width}x${geometry.height} board.`);
  }
  return (rankNumber - 1) * geometry.width + col;
}

export function cellToSquare(cell: number, geometry: BoardGeometry): string {
  const row = Math.floor(cell / geometry.width);
  const col = cell % geometry.width;
  return `${String.fromCharCode(97 + col)}${row + 1}`;
}

export function isCellOnBoard(cell: number, geometry: BoardGeometry): boolean {
  return Number.isInteger(cell) && cell >= 0 && cell < geometry.width * geometry.height;
}

/**
 * One ply. Cells are `row * width + col` with row 0 at rank 1.
 *
 * Moves issued by a rules oracle carry the oracle's own notation as
 * `backendToken`; their cells are always parsed from that token.
 */
export class Move {
  readonly from: number;
  readonly to: number;
  readonly promotion: string | null;
  readonly backendToken: string | null;
  readonly geometry: BoardGeometry;

  private constructor(
    from: number,
    to: number,
    promotion: string | null,
    backendToken: string | null,
    geometry: BoardGeometry,
  ) {
    this.from = from;
    this.to = to;
    this.promotion = promotion;
    this.backendToken = backendToken;
    this.geometry = geometry;
    Object.freeze(this);
  }

  static of(from: number, to: number, geometry: BoardGeometry = CHESS_GEOMETRY, promotion?: string): Move {
    if (!isCellOnBoard(from, geometry) || !isCellOnBoard(to, geometry)) {
      throw new ParseError(`Cells ${from} -> ${to} are off the ${geometry.width}x${geometry.height} board.`);
    }
    const promo = promotion?.toLowerCase() ?? null;
    if (promo !== null && !geometry.promotions.includes(promo)) {
      throw new ParseError(`Promotion '${promotion}' is not allowed on this board.`);
    }
    return new Move(from, to, promo, null, geometry);
  }

  static fromUciLike(text: string, geometry: BoardGeometry = CHESS_GEOMETRY): Move {
    const trimmed = text.trim();
    const match = UCI_LIKE.exec(trimmed.toLowerCase());
    if (!match) {
      throw new ParseError(`Cannot parse move '${text}'.`);
    }
    const [, fromFile, fromRank, toFile, toRank, promotion] = match;
    if (!fromFile || !fromRank || !toFile || !toRank) {
      throw new ParseError(`Cannot parse move '${text}'.`);
    }
    const from = squareToCell(fromFile, fromRank, geometry, text);
    const to = squareToCell(toFile, toRank, geometry, text);
    return Move.of(from, to, geometry, promotion);
  }

  static fromBackendToken(token: string, geometry: BoardGeometry): Move {
    const parsed = Move.fromUciLike(token, geometry);
    return new Move(parsed.from, parsed.to, parsed.promotion, token, geometry);
  }

  toNotation(): string {
    if (this.backendToken !== null) {
      return this.backendToken;
    }
    const squares = cellToSquare(this.from, this.geometry) + cellToSquare(this.to, this.geometry);
    return this.promotion ? squares + this.promotion : squares;
  }

  equals(other: Move): boolean {
    if (this.backendToken !== null && other.backendToken !== null) {
      return this.backendToken === other.backendToken;
    }
    return (
      this.from === other.from &&
      this.to === other.to &&
      this.promotion === other.promotion &&
      this.geometry.width === other.geometry.width &&
      this.geometry.height === other.geometry.height
    );
  }

  /** Hash key; equal moves share a key. */
  key(): string {
    return `${this.geometry.width}x${this.geometry.height}:${this.from}-${this.to}${this.promotion ?? ""}`;
  }

  toString(): string {
    return this.toNotation();
  }
}
