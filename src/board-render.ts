import { Chess } from "chess.js";

const WHITE_PIECES: Record<string, string> = {
  p: "♙",
  n: "♘",
  b: "♗",
  r: "♖",
  q: "♕",
  k: "♔",
};

const BLACK_PIECES: Record<string, string> = {
  p: "♟",
  n: "♞",
  b: "♝",
  r: "♜",
  q: "♛",
  k: "♚",
};

const XIANGQI_FILES = "   a b c d e f g h i";

const XIANGQI_GLYPHS: Record<string, string> = {
  R: "俥",
  N: "傌",
  H: "傌",
  B: "相",
  E: "相",
  A: "仕",
  K: "帥",
  C: "炮",
  P: "兵",
  r: "車",
  n: "馬",
  h: "馬",
  b: "象",
  e: "象",
  a: "士",
  k: "將",
  c: "砲",
  p: "卒",
};

export interface XiangqiRenderOptions {
  /** Traditional character glyphs instead of FEN letters. */
  glyphs?: boolean;
}

export function renderChessBoard(fen: string): string {
  const chess = new Chess(fen);
  const lines: string[] = [];

  chess.board().forEach((row, rankIndex) => {
    const cells = row
      .map((piece) => {
        if (!piece) {
          return "·";
        }
        return piece.color === "w" ? WHITE_PIECES[piece.type] : BLACK_PIECES[piece.type];
      })
      .join(" ");
    lines.push(`${8 - rankIndex} ${cells}`);
  });
  lines.push("  a b c d e f g h");

  return lines.join("\n");
}

/**
 * Uppercase is red, lowercase black. The river sits between ranks 6 and 5.
 */
export function renderXiangqiBoard(fen: string, options: XiangqiRenderOptions = {}): string {
  const [placement = "", turn = "w"] = fen.split(" ");
  const lines = [XIANGQI_FILES];

  placement.split("/").forEach((rank, index) => {
    const cells: string[] = [];
    for (const char of rank) {
      if (char >= "0" && char <= "9") {
        cells.push(...Array.from({ length: Number.parseInt(char, 10) }, () => "."));
      } else {
        cells.push(options.glyphs ? (XIANGQI_GLYPHS[char] ?? char) : char);
      }
    }
    const rankNumber = 10 - index;
    lines.push(`${String(rankNumber).padStart(2, " ")} ${cells.join(" ")}`);
    if (index === 4) {
      lines.push("   ~~~~~ river ~~~~~");
    }
  });

  lines.push(XIANGQI_FILES);
  lines.push(`Turn: ${turn === "w" ? "red" : "black"}`);
  return lines.join("\n");
}
