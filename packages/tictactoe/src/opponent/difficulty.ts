import type { Schema } from "@adobe/data/schema";
import type { schema } from "./difficulty-schema.js";

export type Difficulty = Schema.ToType<typeof schema>;
