import { ParseError } from "./errors.js";
import { XIANGQI_GEOMETRY, opponentOf, type Side } from "./types.js";

export type XiangqiPieceKind = "soldier" | "horse" | "elephant" | "advisor" | "chariot" | "cannon" | "general";

export interface XiangqiPiece {
  kind: XiangqiPieceKind;
  side: Side;
}

/**
 * Cells are `row * 9 + col`; row 0 is rank 1, red's back rank. Red is the
 * first player and moves up the board.
 */
export interface XiangqiPosition {
  cells: readonly (XiangqiPiece | null)[];
  sideToMove: Side;
  halfmoveClock: number;
  fullmoveNumber: number;
}

export interface CellMove {
  from: number;
  to: number;
}

export const XIANGQI_START_FEN = "rnbakabnr/9/1c5c1/p1p1p1p1p/9/9/P1P1P1P1P/1C5C1/9/RNBAKABNR w - - 0 1";

const WIDTH = XIANGQI_GEOMETRY.width;
const HEIGHT = XIANGQI_GEOMETRY.height;

const LETTER_OF: Readonly<Record<XiangqiPieceKind, string>> = {
  soldier: "p",
  horse: "n",
  elephant: "b",
  advisor: "a",
  chariot: "r",
  cannon: "c",
  general: "k",
};

const KIND_OF: Readonly<Record<string, XiangqiPieceKind>> = {
  p: "soldier",
  n: "horse",
  h: "horse",
  b: "elephant",
  e: "elephant",
  a: "advisor",
  r: "chariot",
  c: "cannon",
  k: "general",
};

const ORTHOGONAL: readonly (readonly [number, number])[] = [
  [1, 0],
  [-1, 0],
  [0, -1],
  [0, 1],
];

const DIAGONAL: readonly (readonly [number, number])[] = [
  [1, -1],
  [1, 1],
  [-1, -1],
  [-1, 1],
];

const ATTACKING_KINDS: ReadonlySet<XiangqiPieceKind> = new Set(["chariot", "horse", "cannon", "soldier"]);

function cellAt(row: number, col: number): number {
  return row * WIDTH + col;
}

function onBoard(row: number, col: number): boolean {
  return row >= 0 && row < HEIGHT && col >= 0 && col < WIDTH;
}

function inPalace(side: Side, row: number, col: number): boolean {
  if (col < 3 || col > 5) {
    return false;
  }
  return side === "first" ? row <= 2 : row >= 7;
}

function onOwnHalf(side: Side, row: number): boolean {
  return side === "first" ? row <= 4 : row >= 5;
}

export function pieceLetter(piece: XiangqiPiece): string {
  const letter = LETTER_OF[piece.kind];
  return piece.side === "first" ? letter.toUpperCase() : letter;
}

export function parseXiangqiFen(fen: string): XiangqiPosition {
  const [placement, turn = "w", , , halfmove = "0", fullmove = "1"] = fen.trim().split(/\s+/);
  const ranks = (placement ?? "").split("/");
  if (ranks.length !== HEIGHT) {
    throw new ParseError(`Xiangqi FEN needs ${HEIGHT} ranks, got ${ranks.length}: '${fen}'.`);
  }

  const cells: (XiangqiPiece | null)[] = Array.from({ length: WIDTH * HEIGHT }, () => null);
  ranks.forEach((rank, index) => {
    const row = HEIGHT - 1 - index;
    let col = 0;
    for (const char of rank) {
      if (char >= "1" && char <= "9") {
        col += Number.parseInt(char, 10);
        continue;
      }
      const kind = KIND_OF[char.toLowerCase()];
      if (!kind || col >= WIDTH) {
        throw new ParseError(`Unexpected '${char}' in Xiangqi FEN rank ${10 - index}: '${fen}'.`);
      }
      cells[cellAt(row, col)] = { kind, side: char === char.toUpperCase() ? "first" : "second" };
      col += 1;
    }
    if (col !== WIDTH) {
      throw new ParseError(`Xiangqi FEN rank ${10 - index} covers ${col} files, expected ${WIDTH}: '${fen}'.`);
    }
  });

  if (turn !== "w" && turn !== "r" && turn !== "b") {
    throw new ParseError(`Unknown side to move '${turn}' in '${fen}'.`);
  }
  const halfmoveClock = Number.parseInt(halfmove, 10);
  const fullmoveNumber = Number.parseInt(fullmove, 10);
  return {
    cells,
    sideToMove: turn === "b" ? "second" : "first",
    halfmoveClock: Number.isNaN(halfmoveClock) ? 0 : halfmoveClock,
    fullmoveNumber: Number.isNaN(fullmoveNumber) ? 1 : fullmoveNumber,
  };
}

export function placementOf(position: XiangqiPosition): string {
  const ranks: string[] = [];
  for (let row = HEIGHT - 1; row >= 0; row -= 1) {
    let rank = "";
    let empty = 0;
    for (let col = 0; col < WIDTH; col += 1) {
      const piece = position.cells[cellAt(row, col)];
      if (!piece) {
        empty += 1;
        continue;
      }
      if (empty > 0) {
        rank += String(empty);
        empty = 0;
      }
      rank += pieceLetter(piece);
    }
    ranks.push(empty > 0 ? rank + String(empty) : rank);
  }
  return ranks.join("/");
}

export function serializeXiangqiFen(position: XiangqiPosition): string {
  const turn = position.sideToMove === "first" ? "w" : "b";
  return `${placementOf(position)} ${turn} - - ${position.halfmoveClock} ${position.fullmoveNumber}`;
}

function slide(
  cells: readonly (XiangqiPiece | null)[],
  side: Side,
  row: number,
  col: number,
  targets: number[],
  asCannon: boolean,
): void {
  for (const [dr, dc] of ORTHOGONAL) {
    let r = row + dr;
    let c = col + dc;
    let screened = false;
    while (onBoard(r, c)) {
      const occupant = cells[cellAt(r, c)];
      if (!screened) {
        if (!occupant) {
          targets.push(cellAt(r, c));
        } else if (asCannon) {
          screened = true;
        } else {
          if (occupant.side !== side) {
            targets.push(cellAt(r, c));
          }
          break;
        }
      } else if (occupant) {
        if (occupant.side !== side) {
          targets.push(cellAt(r, c));
        }
        break;
      }
      r += dr;
      c += dc;
    }
  }
}

/** Destinations ignoring whether the mover's own general is left exposed. */
function pseudoTargets(cells: readonly (XiangqiPiece | null)[], from: number): number[] {
  const piece = cells[from];
  if (!piece) {
    return [];
  }
  const { side, kind } = piece;
  const row = Math.floor(from / WIDTH);
  const col = from % WIDTH;
  const targets: number[] = [];
  const addStep = (r: number, c: number): void => {
    if (!onBoard(r, c)) {
      return;
    }
    const occupant = cells[cellAt(r, c)];
    if (!occupant || occupant.side !== side) {
      targets.push(cellAt(r, c));
    }
  };

  switch (kind) {
    case "general":
      for (const [dr, dc] of ORTHOGONAL) {
        if (inPalace(side, row + dr, col + dc)) {
          addStep(row + dr, col + dc);
        }
      }
      break;
    case "advisor":
      for (const [dr, dc] of DIAGONAL) {
        if (inPalace(side, row + dr, col + dc)) {
          addStep(row + dr, col + dc);
        }
      }
      break;
    case "elephant":
      for (const [dr, dc] of DIAGONAL) {
        const r = row + 2 * dr;
        const c = col + 2 * dc;
        if (onBoard(r, c) && onOwnHalf(side, r) && !cells[cellAt(row + dr, col + dc)]) {
          addStep(r, c);
        }
      }
      break;
    case "horse":
      for (const [dr, dc] of ORTHOGONAL) {
        if (!onBoard(row + dr, col + dc) || cells[cellAt(row + dr, col + dc)]) {
          continue;
        }
        if (dr !== 0) {
          addStep(row + 2 * dr, col - 1);
          addStep(row + 2 * dr, col + 1);
        } else {
          addStep(row - 1, col + 2 * dc);
          addStep(row + 1, col + 2 * dc);
        }
      }
      break;
    case "chariot":
      slide(cells, side, row, col, targets, false);
      break;
    case "cannon":
      slide(cells, side, row, col, targets, true);
      break;
    case "soldier": {
      const forward = side === "first" ? 1 : -1;
      addStep(row + forward, col);
      if (!onOwnHalf(side, row)) {
        addStep(row, col - 1);
        addStep(row, col + 1);
      }
      break;
    }
  }
  return targets;
}

function findGeneral(cells: readonly (XiangqiPiece | null)[], side: Side): number {
  return cells.findIndex((piece) => piece?.kind === "general" && piece.side === side);
}

function generalsFace(cells: readonly (XiangqiPiece | null)[]): boolean {
  const red = findGeneral(cells, "first");
  const black = findGeneral(cells, "second");
  if (red < 0 || black < 0 || red % WIDTH !== black % WIDTH) {
    return false;
  }
  for (let cell = red + WIDTH; cell < black; cell += WIDTH) {
    if (cells[cell]) {
      return false;
    }
  }
  return true;
}

function generalExposed(cells: readonly (XiangqiPiece | null)[], side: Side): boolean {
  const general = findGeneral(cells, side);
  if (general < 0) {
    return false;
  }
  if (generalsFace(cells)) {
    return true;
  }
  const enemy = opponentOf(side);
  for (let cell = 0; cell < cells.length; cell += 1) {
    if (cells[cell]?.side === enemy && pseudoTargets(cells, cell).includes(general)) {
      return true;
    }
  }
  return false;
}

function moveCells(cells: readonly (XiangqiPiece | null)[], move: CellMove): (XiangqiPiece | null)[] {
  const next = cells.slice();
  next[move.to] = next[move.from] ?? null;
  next[move.from] = null;
  return next;
}

export function isInCheck(position: XiangqiPosition, side: Side = position.sideToMove): boolean {
  return generalExposed(position.cells, side);
}

/** Legal moves for the side to move, ordered by source cell then direction. */
export function generateLegalMoves(position: XiangqiPosition): CellMove[] {
  const side = position.sideToMove;
  const moves: CellMove[] = [];
  position.cells.forEach((piece, from) => {
    if (piece?.side !== side) {
      return;
    }
    for (const to of pseudoTargets(position.cells, from)) {
      if (!generalExposed(moveCells(position.cells, { from, to }), side)) {
        moves.push({ from, to });
      }
    }
  });
  return moves;
}

/** Returns the position after `move`; the input is not modified. The move is assumed legal. */
export function applyCellMove(position: XiangqiPosition, move: CellMove): XiangqiPosition {
  const captured = position.cells[move.to] !== null && position.cells[move.to] !== undefined;
  return {
    cells: moveCells(position.cells, move),
    sideToMove: opponentOf(position.sideToMove),
    halfmoveClock: captured ? 0 : position.halfmoveClock + 1,
    fullmoveNumber: position.sideToMove === "second" ? position.fullmoveNumber + 1 : position.fullmoveNumber,
  };
}

export function hasAttackingMaterial(position: XiangqiPosition): boolean {
  return position.cells.some((piece) => piece !== null && ATTACKING_KINDS.has(piece.kind));
}
