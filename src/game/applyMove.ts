import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { isLegalMove } from "./movegen.ts";
import { formatMove } from "./moveNotation.ts";
import { opponent } from "../types.ts";

export function applyMove(state: GameState, move: Move): GameState {
  if (!isLegalMove(state, move)) {
    throw new Error(`applyMove: illegal move ${formatMove(move)}`);
  }

  const nextBoard = new Map(state.board);
  // A capture simply overwrites the enemy pawn on the target square
  nextBoard.set(move.to, state.toMove);
  nextBoard.delete(move.from);

  return { board: nextBoard, toMove: opponent(state.toMove) };
}
