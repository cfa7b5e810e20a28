import { BoardState } from "../types/board-state/board-state.js";
import { BoardPosition } from "../types/board-position/board-position.js";
import { PlayMoveArgs } from "../types/play-move-args/play-move-args.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";
import type { MoveRejectReason } from "../types/move-reject-reason.js";
import type { PositionRejectReason } from "../types/board-position/position-reject-reason.js";
import type { TictactoeModelDatabase } from "../plugins/tictactoe-model-plugin.js";
import { chooseMove } from "../opponent/choose-move.js";
import type { Config } from "../config/config.js";
import type { Logger } from "../logger/create-logger.js";
import { renderBoard } from "../render/render-board.js";
import * as messages from "../render/messages.js";
import { type GameInput, type GameOutput, writeLine } from "./game-io.js";
import type { GameResult } from "./game-result.js";

export interface PlayGameArgs {
  readonly db: TictactoeModelDatabase;
  readonly input: GameInput;
  readonly output: GameOutput;
  readonly config: Config;
  readonly logger: Logger;
}

const isComputer = (config: Config, mark: PlayerMark): boolean =>
  config.opponent === "computer" && mark === config.computerMark;

type CheckLineResult =
  | { readonly ok: true; readonly index: number }
  | { readonly ok: false; readonly reason: MoveRejectReason | PositionRejectReason };

const checkLine = (line: string, board: BoardState): CheckLineResult => {
  const position = BoardPosition.parseBoardPosition(line);
  if (!position.ok) {
    return position;
  }
  const move = PlayMoveArgs.canPlayMove({ board, index: position.index });
  return move.ok ? position : move;
};

/** Prompts until the player names an empty cell; null when input closes first. */
const readHumanMove = async (
  { input, output, logger }: PlayGameArgs,
  board: BoardState,
  mark: PlayerMark
): Promise<number | null> => {
  for (;;) {
    const line = await input.readLine(messages.promptFor(mark));
    if (line === null) {
      return null;
    }

    const checked = checkLine(line, board);
    if (checked.ok) {
      return checked.index;
    }

    const { reason } = checked;
    logger.debug(`rejected ${JSON.stringify(line)} from ${mark}: ${reason}`);
    writeLine(output, messages.rejectionReasons[reason]);
    writeLine(output, messages.invalidInput);
  }
};

const readComputerMove = ({ output, config }: PlayGameArgs, board: BoardState, mark: PlayerMark): number => {
  const index = chooseMove({ board, mark, difficulty: config.difficulty });
  if (index === null) {
    throw new Error(`No move available for ${mark} on an unfinished board`);
  }
  writeLine(output, messages.computerChose(mark, BoardPosition.toBoardPosition(index)));
  return index;
};

const finish = ({ output, logger }: PlayGameArgs, board: BoardState): GameResult => {
  const winner = BoardState.getWinner(board);
  if (winner !== null) {
    writeLine(output, messages.winnerIs(winner));
    logger.info(`game won by ${winner}`);
    return { status: "won", winner, board };
  }
  writeLine(output, messages.draw);
  logger.info("game drawn");
  return { status: "draw", board };
};

/**
 * Runs the game held in `db` until it is won, drawn or input closes,
 * printing the board before every turn and once more at the end.
 */
export const playGame = async (args: PlayGameArgs): Promise<GameResult> => {
  const { db, output, config, logger } = args;
  logger.info(`game started, ${db.resources.firstPlayer} moves first`);

  for (;;) {
    const board = db.resources.board;
    writeLine(output);
    writeLine(output, messages.boardHeading);
    writeLine(output, renderBoard(board));

    if (BoardState.isGameOver(board)) {
      return finish(args, board);
    }

    const mark = BoardState.currentPlayer(board, db.resources.firstPlayer);
    const index = isComputer(config, mark)
      ? readComputerMove(args, board, mark)
      : await readHumanMove(args, board, mark);

    if (index === null) {
      // input closed mid-prompt, leaving the cursor at the end of that line
      writeLine(output);
      writeLine(output, messages.abandoned);
      logger.info("game abandoned");
      return { status: "abandoned", board };
    }

    logger.debug(`move ${BoardState.getMoveCount(board) + 1}: ${mark} played ${BoardPosition.toBoardPosition(index)}`);
    db.transactions.playMove({ index });
  }
};
