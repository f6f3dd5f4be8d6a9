import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { ALL_SQUARES } from "./coords.ts";
import { canAdvanceTo, captureCandidates } from "./board.ts";
import { pieceAt } from "./state.ts";
import { opponent } from "../types.ts";

export function isLegalMove(state: GameState, move: Move): boolean {
  const mover = state.toMove;
  if (pieceAt(state, move.from) !== mover) return false;

  const target = pieceAt(state, move.to);

  // Straight advance, never onto an occupied square
  if (canAdvanceTo(move.from, move.to, mover) && target === null) return true;

  // Diagonal capture needs an enemy pawn on the target
  if (captureCandidates(move.from, mover).includes(move.to) && target === opponent(mover)) return true;

  return false;
}

/**
 * Lazily yields every legal move for the side to move, scanning `from` then
 * `to` over ALL_SQUARES. Each call starts a fresh scan of the current state.
 */
export function* legalMoves(state: GameState): Generator<Move, void, undefined> {
  for (const from of ALL_SQUARES) {
    for (const to of ALL_SQUARES) {
      const move: Move = { from, to };
      if (isLegalMove(state, move)) yield move;
    }
  }
}

export function generateLegalMoves(state: GameState): Move[] {
  return [...legalMoves(state)];
}
