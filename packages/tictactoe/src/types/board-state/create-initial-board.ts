import type { BoardState } from "./board-state.js";
import { CELL_COUNT, EMPTY_CELL } from "./board-state-constants.js";

export const createInitialBoard = (): BoardState => EMPTY_CELL.repeat(CELL_COUNT);
