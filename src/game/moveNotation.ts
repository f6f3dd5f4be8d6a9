import type { Move } from "./moveTypes.ts";
import { isSquare } from "./coords.ts";

const MOVE_RE = /^(?<from>[a-c][1-3])(?<to>[a-c][1-3])$/;

/** Thrown when move text does not match the `<square><square>` grammar, e.g. "c2b3". */
export class ParseError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid move notation: '${input}'`);
    this.name = "ParseError";
    this.input = input;
  }
}

export function parseMove(text: string): Move {
  const match = MOVE_RE.exec(text.trim().toLowerCase());
  const from = match?.groups?.from;
  const to = match?.groups?.to;
  if (!isSquare(from) || !isSquare(to)) throw new ParseError(text);
  return { from, to };
}

export function tryParseMove(text: string): Move | null {
  try {
    return parseMove(text);
  } catch (err) {
    if (err instanceof ParseError) return null;
    throw err;
  }
}

export function formatMove(move: Move): string {
  return `${move.from}${move.to}`;
}
