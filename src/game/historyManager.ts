import type { GameState } from "./state.ts";
import { cloneGameState } from "./state.ts";

type HistoryEntry = {
  state: GameState;
  /** Notation of the move that produced `state`; empty for the starting entry. */
  notation: string;
};

/**
 * Position history for undo/redo. Entries are cloned on the way in and out,
 * so callers never share a state with the stored history.
 */
export class HistoryManager {
  private entries: HistoryEntry[] = [];
  private cursor = -1;

  /** Drops everything and starts over from `state`. */
  restart(state: GameState): void {
    this.entries = [{ state: cloneGameState(state), notation: "" }];
    this.cursor = 0;
  }

  /** Records the position after a move; any redo tail is discarded. */
  push(state: GameState, notation: string): void {
    this.entries = this.entries.slice(0, this.cursor + 1);
    this.entries.push({ state: cloneGameState(state), notation });
    this.cursor = this.entries.length - 1;
  }

  canUndo(): boolean {
    return this.cursor > 0;
  }

  canRedo(): boolean {
    return this.cursor < this.entries.length - 1;
  }

  undo(): GameState | null {
    if (!this.canUndo()) return null;
    this.cursor--;
    return cloneGameState(this.entries[this.cursor].state);
  }

  redo(): GameState | null {
    if (!this.canRedo()) return null;
    this.cursor++;
    return cloneGameState(this.entries[this.cursor].state);
  }

  exportSnapshots(): { states: GameState[]; notation: string[]; currentIndex: number } {
    return {
      states: this.entries.map((e) => cloneGameState(e.state)),
      notation: this.entries.map((e) => e.notation),
      currentIndex: this.cursor,
    };
  }
}
