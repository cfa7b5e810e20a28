import type { BoardState } from "./board-state.js";
import { deriveStatus } from "./derive-status.js";

export const isGameOver = (board: BoardState): boolean => deriveStatus(board) !== "in_progress";
