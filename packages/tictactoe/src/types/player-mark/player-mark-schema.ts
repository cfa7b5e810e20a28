import type { Schema } from "@adobe/data/schema";

export const schema = {
  type: "string",
  enum: ["X", "O"],
  description: "Mark placed by a player; X and O alternate turns."
} as const satisfies Schema;
