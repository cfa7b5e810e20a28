import type { Schema } from "@adobe/data/schema";

export const schema = {
  type: "string",
  enum: ["easy", "perfect"],
  description: "How well the computer opponent plays."
} as const satisfies Schema;
