import type { Schema } from "@adobe/data/schema";
import { CELL_COUNT } from "./board-state-constants.js";

export const schema = {
  type: "string",
  description: "3x3 board as 9 characters (X, O or space), left to right, top to bottom.",
  minLength: CELL_COUNT,
  maxLength: CELL_COUNT
} as const satisfies Schema;
