import { PlayerMark } from "../types/player-mark/player-mark.js";
import { schema as difficultySchema } from "../opponent/difficulty-schema.js";
import { logLevelSchema } from "../logger/create-logger.js";
import { type Config, type ConfigOverrides, opponentKindSchema, switchSchema } from "./config.js";
import { ConfigError } from "./config-error.js";

export type Environment = Readonly<Record<string, string | undefined>>;

const readChoice = <T extends string>({
  setting,
  value,
  choices
}: {
  readonly setting: string;
  readonly value: string;
  readonly choices: readonly T[];
}): T => {
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) {
    throw new ConfigError(`${setting} must be one of ${choices.join(", ")} (got "${value}")`, setting);
  }
  return choice;
};

// An error names the flag when the value came from the command line, else the variable.
const readSetting = <T extends string>({
  flag,
  override,
  variable,
  env,
  fallback,
  choices
}: {
  readonly flag: string;
  readonly override: string | undefined;
  readonly variable: string;
  readonly env: Environment;
  readonly fallback: T;
  readonly choices: readonly T[];
}): T =>
  override !== undefined
    ? readChoice({ setting: flag, value: override, choices })
    : readChoice({ setting: variable, value: env[variable] ?? fallback, choices });

export const loadConfig = ({
  env = process.env,
  overrides = {}
}: {
  readonly env?: Environment;
  readonly overrides?: ConfigOverrides;
} = {}): Config => {
  const rematch =
    overrides.rematch ??
    readChoice({
      setting: "TICTACTOE_REMATCH",
      value: env.TICTACTOE_REMATCH ?? "true",
      choices: switchSchema.enum
    }) === "true";

  return {
    firstPlayer: readSetting({
      flag: "--first",
      override: overrides.firstPlayer,
      variable: "TICTACTOE_FIRST_PLAYER",
      env,
      fallback: "X",
      choices: PlayerMark.schema.enum
    }),
    opponent: readSetting({
      flag: "--opponent",
      override: overrides.opponent,
      variable: "TICTACTOE_OPPONENT",
      env,
      fallback: "human",
      choices: opponentKindSchema.enum
    }),
    computerMark: readSetting({
      flag: "--computer-mark",
      override: overrides.computerMark,
      variable: "TICTACTOE_COMPUTER_MARK",
      env,
      fallback: "O",
      choices: PlayerMark.schema.enum
    }),
    difficulty: readSetting({
      flag: "--difficulty",
      override: overrides.difficulty,
      variable: "TICTACTOE_DIFFICULTY",
      env,
      fallback: "perfect",
      choices: difficultySchema.enum
    }),
    rematch,
    logLevel: readSetting({
      flag: "--log-level",
      override: overrides.logLevel,
      variable: "TICTACTOE_LOG_LEVEL",
      env,
      fallback: "silent",
      choices: logLevelSchema.enum
    })
  };
};
