import type { BoardState } from "./board-state.js";
import { EMPTY_CELL } from "./board-state-constants.js";

export const isBoardFull = (board: BoardState): boolean => !board.includes(EMPTY_CELL);
