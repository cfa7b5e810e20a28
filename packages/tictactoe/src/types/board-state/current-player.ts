import type { BoardState } from "./board-state.js";
import type { PlayerMark } from "../player-mark/player-mark.js";
import { opponentOf } from "../player-mark/opponent-of.js";

const countMarks = (board: BoardState, mark: PlayerMark): number =>
  [...board].filter((cell) => cell === mark).length;

/**
 * The player to move. Turns alternate from `firstPlayer`, so whoever
 * started moves again whenever both players have placed the same number of marks.
 */
export const currentPlayer = (board: BoardState, firstPlayer: PlayerMark = "X"): PlayerMark => {
  const second = opponentOf(firstPlayer);
  return countMarks(board, firstPlayer) <= countMarks(board, second) ? firstPlayer : second;
};
