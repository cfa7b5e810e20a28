import type { BoardState } from "./board-state.js";
import { EMPTY_CELL } from "./board-state-constants.js";

export const getEmptyCells = (board: BoardState): number[] =>
  [...board].flatMap((cell, index) => (cell === EMPTY_CELL ? [index] : []));
