import type { GameState } from "../game/state.ts";
import { BOARD_SIZE, squareAt } from "../game/coords.ts";
import { pieceAt } from "../game/state.ts";

const WHITE_PAWN = "♙";
const BLACK_PAWN = "♟";
const LIGHT_SQUARE = "□";
const DARK_SQUARE = "■";

/**
 * Text diagram of the board, rank 1 on the first line. Every cell is followed
 * by a space; there is no trailing newline.
 */
export function renderUnicode(state: GameState): string {
  const lines: string[] = [];
  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    let line = "";
    for (let file = 0; file < BOARD_SIZE; file++) {
      const sq = squareAt(file, rank);
      const piece = sq ? pieceAt(state, sq) : null;
      if (piece === "W") line += `${WHITE_PAWN} `;
      else if (piece === "B") line += `${BLACK_PAWN} `;
      else line += `${(file + rank) % 2 !== 0 ? LIGHT_SQUARE : DARK_SQUARE} `;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
