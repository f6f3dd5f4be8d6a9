import type { Square } from "./coords.ts";

export const WHITE_START_SQUARES: readonly Square[] = ["a1", "b1", "c1"];

export const BLACK_START_SQUARES: readonly Square[] = ["a3", "b3", "c3"];
