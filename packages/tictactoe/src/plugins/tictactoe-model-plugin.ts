import { Database } from "@adobe/data/ecs";
import { BoardState } from "../types/board-state/board-state.js";
import { PlayerMark } from "../types/player-mark/player-mark.js";
import { PlayMoveArgs } from "../types/play-move-args/play-move-args.js";

const defaultFirstPlayer: PlayerMark = "X";

export interface StartGameArgs {
  readonly firstPlayer: PlayerMark;
}

export const tictactoeModelPlugin = Database.Plugin.create({
  resources: {
    board: { default: BoardState.createInitialBoard() },
    firstPlayer: { default: defaultFirstPlayer }
  },
  transactions: {
    startGame: (t, { firstPlayer }: StartGameArgs) => {
      t.resources.firstPlayer = firstPlayer;
      t.resources.board = BoardState.createInitialBoard();
    },
    // Rematches alternate who opens.
    restartGame: (t) => {
      t.resources.firstPlayer = PlayerMark.opponentOf(t.resources.firstPlayer);
      t.resources.board = BoardState.createInitialBoard();
    },
    playMove: (t, { index }: PlayMoveArgs) => {
      const validation = PlayMoveArgs.canPlayMove({
        board: t.resources.board,
        index
      });

      if (!validation.ok) {
        return;
      }

      t.resources.board = BoardState.setBoardCell({
        board: t.resources.board,
        index,
        mark: BoardState.currentPlayer(t.resources.board, t.resources.firstPlayer)
      });
    }
  }
});

export type TictactoeModelDatabase = Database.FromPlugin<typeof tictactoeModelPlugin>;
