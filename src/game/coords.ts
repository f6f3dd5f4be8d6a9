export type Square = "a1" | "a2" | "a3" | "b1" | "b2" | "b3" | "c1" | "c2" | "c3";

export const BOARD_SIZE = 3;

const FILES = "abc";

/** Canonical order: file-major, rank ascending within each file. */
export const ALL_SQUARES: readonly Square[] = ["a1", "a2", "a3", "b1", "b2", "b3", "c1", "c2", "c3"];

const COORDS: Record<Square, { file: number; rank: number }> = {
  a1: { file: 0, rank: 0 },
  a2: { file: 0, rank: 1 },
  a3: { file: 0, rank: 2 },
  b1: { file: 1, rank: 0 },
  b2: { file: 1, rank: 1 },
  b3: { file: 1, rank: 2 },
  c1: { file: 2, rank: 0 },
  c2: { file: 2, rank: 1 },
  c3: { file: 2, rank: 2 },
};

export function isSquare(raw: unknown): raw is Square {
  return typeof raw === "string" && ALL_SQUARES.some((sq) => sq === raw);
}

export function squareCoords(sq: Square): { file: number; rank: number } {
  const { file, rank } = COORDS[sq];
  return { file, rank };
}

export function inBounds(file: number, rank: number): boolean {
  return file >= 0 && file < BOARD_SIZE && rank >= 0 && rank < BOARD_SIZE;
}

export function squareAt(file: number, rank: number): Square | null {
  if (!Number.isInteger(file) || !Number.isInteger(rank) || !inBounds(file, rank)) return null;
  const label = `${FILES[file]}${rank + 1}`;
  return isSquare(label) ? label : null;
}
