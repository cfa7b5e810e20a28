import type { PlayerMark } from "../types/player-mark/player-mark.js";
import type { GameResult } from "./game-result.js";

export type Scoreboard = Readonly<Record<PlayerMark, number>> & { readonly draws: number };

export const createScoreboard = (): Scoreboard => ({ X: 0, O: 0, draws: 0 });

export const recordResult = (scoreboard: Scoreboard, result: GameResult): Scoreboard => {
  switch (result.status) {
    case "won":
      return { ...scoreboard, [result.winner]: scoreboard[result.winner] + 1 };
    case "draw":
      return { ...scoreboard, draws: scoreboard.draws + 1 };
    case "abandoned":
      return scoreboard;
  }
};
