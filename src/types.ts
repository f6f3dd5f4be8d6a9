export type Player = "W" | "B";

export function opponent(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function isPlayer(raw: unknown): raw is Player {
  return raw === "W" || raw === "B";
}
