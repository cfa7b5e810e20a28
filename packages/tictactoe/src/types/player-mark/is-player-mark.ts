import type { PlayerMark } from "./player-mark.js";

export const isPlayerMark = (value: string): value is PlayerMark => value === "X" || value === "O";
