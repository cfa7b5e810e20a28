import type { Schema } from "@adobe/data/schema";
import type { Difficulty } from "../opponent/difficulty.js";
import type { LogLevel } from "../logger/create-logger.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";

export const opponentKindSchema = {
  type: "string",
  enum: ["human", "computer"],
  description: "Who plays against the first human."
} as const satisfies Schema;

export type OpponentKind = Schema.ToType<typeof opponentKindSchema>;

export const switchSchema = {
  type: "string",
  enum: ["true", "false"]
} as const satisfies Schema;

export interface Config {
  readonly firstPlayer: PlayerMark;
  readonly opponent: OpponentKind;
  readonly computerMark: PlayerMark;
  readonly difficulty: Difficulty;
  readonly rematch: boolean;
  readonly logLevel: LogLevel;
}

/** Raw values from the command line; each one wins over its environment variable. */
export interface ConfigOverrides {
  readonly firstPlayer?: string;
  readonly opponent?: string;
  readonly computerMark?: string;
  readonly difficulty?: string;
  readonly rematch?: boolean;
  readonly logLevel?: string;
}
