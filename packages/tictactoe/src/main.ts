#!/usr/bin/env node
import { Database } from "@adobe/data/ecs";
import { tictactoeModelPlugin } from "./plugins/tictactoe-model-plugin.js";
import { parseCliArgs, usage } from "./config/parse-cli-args.js";
import { loadConfig } from "./config/load-config.js";
import { createLogger } from "./logger/create-logger.js";
import { createReadlineInput } from "./session/readline-input.js";
import { runSessions } from "./session/run-sessions.js";

const main = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(usage);
    return;
  }

  const config = loadConfig({ env: process.env, overrides: cli.overrides });
  const logger = createLogger({ level: config.logLevel });
  logger.debug(`config ${JSON.stringify(config)}`);

  const db = Database.create(tictactoeModelPlugin);
  const input = createReadlineInput();
  try {
    const scoreboard = await runSessions({
      db,
      input,
      output: process.stdout,
      config,
      logger
    });
    logger.info(`session over, X ${scoreboard.X} O ${scoreboard.O} draws ${scoreboard.draws}`);
  } finally {
    input.close();
  }
};

main().catch((error: unknown) => {
  console.error(`Failed to start tic-tac-toe: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
