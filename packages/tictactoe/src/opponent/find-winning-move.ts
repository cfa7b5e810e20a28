import { BoardState } from "../types/board-state/board-state.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";

/** First empty cell that completes a line for `mark`, or null. */
export const findWinningMove = (board: BoardState, mark: PlayerMark): number | null =>
  BoardState.getEmptyCells(board).find(
    (index) => BoardState.getWinner(BoardState.setBoardCell({ board, index, mark })) === mark
  ) ?? null;
