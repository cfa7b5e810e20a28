import { BoardState } from "../types/board-state/board-state.js";
import { PlayerMark } from "../types/player-mark/player-mark.js";
import { findWinningMove } from "./find-winning-move.js";

// centre, corners, edges
const preferredCells = [4, 0, 2, 6, 8, 1, 3, 5, 7] as const;

export const chooseEasyMove = (board: BoardState, mark: PlayerMark): number | null => {
  if (BoardState.isGameOver(board)) {
    return null;
  }
  return (
    findWinningMove(board, mark) ??
    findWinningMove(board, PlayerMark.opponentOf(mark)) ??
    preferredCells.find((index) => board[index] === BoardState.EMPTY_CELL) ??
    null
  );
};
