import type { GameStatus } from "../game-status.js";
import type { BoardState } from "./board-state.js";
import { getWinningLine } from "./get-winning-line.js";
import { isBoardFull } from "./is-board-full.js";

export type BoardStatus = Extract<GameStatus, "in_progress" | "won" | "draw">;

// A line completed by the last move wins even when it also fills the board.
export const deriveStatus = (board: BoardState): BoardStatus => {
  if (getWinningLine(board) !== null) {
    return "won";
  }
  return isBoardFull(board) ? "draw" : "in_progress";
};
