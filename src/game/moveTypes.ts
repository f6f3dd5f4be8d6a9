import type { Square } from "./coords.ts";

export interface Move {
  from: Square;
  to: Square;
}

export function movesEqual(a: Move, b: Move): boolean {
  return a.from === b.from && a.to === b.to;
}
