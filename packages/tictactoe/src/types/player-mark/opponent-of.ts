import type { PlayerMark } from "./player-mark.js";

export const opponentOf = (mark: PlayerMark): PlayerMark => (mark === "X" ? "O" : "X");
