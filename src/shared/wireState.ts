import type { Player } from "../types.ts";
import { isPlayer } from "../types.ts";
import type { GameState } from "../game/state.ts";
import { ALL_SQUARES, isSquare, type Square } from "../game/coords.ts";

export type WireGameState = {
  board: [Square, Player][];
  toMove: Player;
};

export type WireHistory = {
  states: WireGameState[];
  notation: string[];
  currentIndex: number;
};

export type WireSnapshot = {
  state: WireGameState;
  history: WireHistory;
  /** Legal moves for the side to move, in generation order. */
  legalMoves: string[];
  /** Unicode board diagram. */
  display: string;
};

export function serializeWireGameState(state: GameState): WireGameState {
  const board: [Square, Player][] = [];
  for (const sq of ALL_SQUARES) {
    const piece = state.board.get(sq);
    if (piece) board.push([sq, piece]);
  }
  return { board, toMove: state.toMove };
}

export function deserializeWireGameState(wire: unknown): GameState {
  if (typeof wire !== "object" || wire === null) throw new Error("Invalid wire state: not an object");

  const toMove: unknown = Reflect.get(wire, "toMove");
  if (!isPlayer(toMove)) throw new Error(`Invalid wire state: bad toMove ${String(toMove)}`);

  const rawBoard: unknown = Reflect.get(wire, "board");
  if (!Array.isArray(rawBoard)) throw new Error("Invalid wire state: board is not an array");

  const board = new Map<Square, Player>();
  for (const entry of rawBoard) {
    if (!Array.isArray(entry) || entry.length !== 2) throw new Error("Invalid wire state: bad board entry");
    const [sq, piece]: unknown[] = entry;
    if (!isSquare(sq)) throw new Error(`Invalid wire state: bad square ${String(sq)}`);
    if (!isPlayer(piece)) throw new Error(`Invalid wire state: bad piece on ${sq}`);
    if (board.has(sq)) throw new Error(`Invalid wire state: duplicate square ${sq}`);
    board.set(sq, piece);
  }

  return { board, toMove };
}

export function serializeWireHistory(history: { states: GameState[]; notation: string[]; currentIndex: number }): WireHistory {
  return {
    states: history.states.map(serializeWireGameState),
    notation: [...history.notation],
    currentIndex: history.currentIndex,
  };
}
