import type { Schema } from "@adobe/data/schema";
import type { schema } from "./player-mark-schema.js";

export type PlayerMark = Schema.ToType<typeof schema>;
export * as PlayerMark from "./public.js";
