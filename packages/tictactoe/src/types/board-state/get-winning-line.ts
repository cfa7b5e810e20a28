import { winningLines, type WinningLine } from "../winning-line.js";
import type { BoardState } from "./board-state.js";
import { EMPTY_CELL } from "./board-state-constants.js";

export const getWinningLine = (board: BoardState): WinningLine | null =>
  winningLines.find(([a, b, c]) => board[a] !== EMPTY_CELL && board[a] === board[b] && board[a] === board[c]) ??
  null;
