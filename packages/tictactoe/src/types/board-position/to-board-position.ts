import type { BoardPosition } from "./board-position.js";

export const toBoardPosition = (index: number): BoardPosition => index + 1;
