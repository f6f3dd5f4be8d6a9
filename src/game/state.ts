import type { Player } from "../types.ts";
import type { Square } from "./coords.ts";
import { BLACK_START_SQUARES, WHITE_START_SQUARES } from "./initialPosition.ts";

/** Occupied squares only; a missing entry is an empty square. */
export type BoardState = Map<Square, Player>;

export interface GameState {
  board: BoardState;
  toMove: Player;
}

export function createInitialGameState(): GameState {
  return resetGameState({ board: new Map(), toMove: "W" });
}

/** Restores the starting position in place. White moves first. */
export function resetGameState(state: GameState): GameState {
  state.board.clear();

  for (const sq of WHITE_START_SQUARES) state.board.set(sq, "W");
  for (const sq of BLACK_START_SQUARES) state.board.set(sq, "B");

  state.toMove = "W";
  return state;
}

/**
 * Removes every pawn. The side to move is kept, so callers can set up a
 * position for whoever is on turn.
 */
export function clearBoard(state: GameState): GameState {
  state.board.clear();
  return state;
}

export function pieceAt(state: GameState, sq: Square): Player | null {
  return state.board.get(sq) ?? null;
}

export function setPieceAt(state: GameState, sq: Square, piece: Player | null): GameState {
  if (piece === null) state.board.delete(sq);
  else state.board.set(sq, piece);
  return state;
}

export function cloneGameState(state: GameState): GameState {
  return { board: new Map(state.board), toMove: state.toMove };
}
