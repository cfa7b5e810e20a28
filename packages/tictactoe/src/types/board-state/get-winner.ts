import type { PlayerMark } from "../player-mark/player-mark.js";
import { isPlayerMark } from "../player-mark/is-player-mark.js";
import { getWinningLine } from "./get-winning-line.js";
import type { BoardState } from "./board-state.js";

export const getWinner = (board: BoardState): PlayerMark | null => {
  const winningLine = getWinningLine(board);
  if (winningLine === null) {
    return null;
  }
  const mark = board.charAt(winningLine[0]);
  return isPlayerMark(mark) ? mark : null;
};
