import type { BoardState } from "./board-state.js";
import { EMPTY_CELL } from "./board-state-constants.js";

export const getMoveCount = (board: BoardState): number =>
  [...board].filter((cell) => cell !== EMPTY_CELL).length;
