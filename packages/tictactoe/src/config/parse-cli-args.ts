import { parseArgs } from "node:util";
import type { ConfigOverrides } from "./config.js";
import { ConfigError } from "./config-error.js";

export interface CliArgs {
  readonly help: boolean;
  readonly overrides: ConfigOverrides;
}

export const usage = [
  "Usage: tictactoe [options]",
  "",
  "  --first <X|O>               who moves first (TICTACTOE_FIRST_PLAYER)",
  "  --opponent <human|computer> play a friend or the computer (TICTACTOE_OPPONENT)",
  "  --computer-mark <X|O>       mark the computer plays (TICTACTOE_COMPUTER_MARK)",
  "  --difficulty <easy|perfect> computer strength (TICTACTOE_DIFFICULTY)",
  "  --no-rematch                quit after one game (TICTACTOE_REMATCH=false)",
  "  --log-level <silent|info|debug>  diagnostics on stderr (TICTACTOE_LOG_LEVEL)",
  "  -h, --help                  show this message"
].join("\n");

const options = {
  first: { type: "string" },
  opponent: { type: "string" },
  "computer-mark": { type: "string" },
  difficulty: { type: "string" },
  "no-rematch": { type: "boolean" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" }
} as const;

const readValues = (args: readonly string[]) => {
  try {
    return parseArgs({ args: [...args], options, strict: true, allowPositionals: false }).values;
  } catch (error: unknown) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), "argv");
  }
};

export const parseCliArgs = (args: readonly string[]): CliArgs => {
  const values = readValues(args);

  return {
    help: values.help ?? false,
    overrides: {
      firstPlayer: values.first,
      opponent: values.opponent,
      computerMark: values["computer-mark"],
      difficulty: values.difficulty,
      rematch: values["no-rematch"] === true ? false : undefined,
      logLevel: values["log-level"]
    }
  };
};
