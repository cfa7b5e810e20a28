import { Database } from "@adobe/data/ecs";
import { tictactoeModelPlugin, type TictactoeModelDatabase } from "../plugins/tictactoe-model-plugin.js";
import type { Config } from "../config/config.js";
import { createLogger } from "../logger/create-logger.js";
import type { PlayGameArgs } from "./play-game.js";

const testConfig: Config = {
  firstPlayer: "X",
  opponent: "human",
  computerMark: "O",
  difficulty: "perfect",
  rematch: false,
  logLevel: "silent"
};

/** Answers prompts from `lines` in order, then reports closed input. */
export const createScriptedSession = (
  lines: readonly string[],
  config: Partial<Config> = {}
): PlayGameArgs & { readonly db: TictactoeModelDatabase; readonly prompts: string[]; readonly written: string[] } => {
  const prompts: string[] = [];
  const written: string[] = [];
  const remaining = [...lines];

  return {
    db: Database.create(tictactoeModelPlugin),
    prompts,
    written,
    input: {
      readLine: async (prompt) => {
        prompts.push(prompt);
        return remaining.shift() ?? null;
      }
    },
    output: { write: (text) => void written.push(text) },
    config: { ...testConfig, ...config },
    logger: createLogger({ level: "silent" })
  };
};
