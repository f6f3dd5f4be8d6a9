import type { Player } from "../types.ts";
import { squareAt, squareCoords, type Square } from "./coords.ts";

function forwardRank(rank: number, color: Player): number {
  return rank + (color === "W" ? +1 : -1); // White advances up the ranks, Black down
}

/** Square a pawn of `color` reaches by a non-capturing step, or null past the last rank. */
export function advanceTarget(sq: Square, color: Player): Square | null {
  const { file, rank } = squareCoords(sq);
  return squareAt(file, forwardRank(rank, color));
}

/**
 * Diagonally-forward squares a pawn of `color` on `sq` could capture on,
 * ordered towards the a-file first. Corner files yield one, the b-file two,
 * the last rank none.
 */
export function captureCandidates(sq: Square, color: Player): Square[] {
  const { file, rank } = squareCoords(sq);
  const nr = forwardRank(rank, color);
  const res: Square[] = [];
  for (const dc of [-1, +1]) {
    const target = squareAt(file + dc, nr);
    if (target) res.push(target);
  }
  return res;
}

export function canAdvanceTo(source: Square, target: Square, color: Player): boolean {
  return advanceTarget(source, color) === target;
}
