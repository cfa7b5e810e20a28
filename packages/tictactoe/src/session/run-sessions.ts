import type { PlayGameArgs } from "./play-game.js";
import { playGame } from "./play-game.js";
import { renderPositionGuide } from "../render/render-board.js";
import * as messages from "../render/messages.js";
import { writeLine } from "./game-io.js";
import { type Scoreboard, createScoreboard, recordResult } from "./scoreboard.js";

const isYes = (answer: string): boolean => ["y", "yes"].includes(answer.trim().toLowerCase());

/**
 * Plays games back to back in one database, offering a rematch after each
 * finished game when enabled. Returns the final score.
 */
export const runSessions = async (args: PlayGameArgs): Promise<Scoreboard> => {
  const { db, input, output, config } = args;
  writeLine(output, messages.title);
  writeLine(output);
  writeLine(output, messages.positionGuideHeading);
  writeLine(output, renderPositionGuide());

  db.transactions.startGame({ firstPlayer: config.firstPlayer });
  let scoreboard = createScoreboard();

  for (;;) {
    const result = await playGame(args);
    if (result.status === "abandoned") {
      return scoreboard;
    }

    scoreboard = recordResult(scoreboard, result);
    writeLine(output, messages.formatScoreboard(scoreboard));

    if (!config.rematch) {
      return scoreboard;
    }
    const answer = await input.readLine(messages.playAgainPrompt);
    if (answer === null || !isYes(answer)) {
      return scoreboard;
    }
    db.transactions.restartGame();
  }
};
