import { describe } from "riteway/esm/riteway.js";
import { BoardState } from "../types/board-state/board-state.js";
import { PlayerMark } from "../types/player-mark/player-mark.js";
import { chooseEasyMove } from "./choose-easy-move.js";
import { choosePerfectMove } from "./choose-perfect-move.js";

type Strategy = (board: BoardState, mark: PlayerMark) => number | null;

const playOut = (strategies: Readonly<Record<PlayerMark, Strategy>>): BoardState => {
  let board = BoardState.createInitialBoard();
  let mark: PlayerMark = "X";
  let index = strategies[mark](board, mark);
  while (index !== null) {
    board = BoardState.setBoardCell({ board, index, mark });
    mark = PlayerMark.opponentOf(mark);
    index = strategies[mark](board, mark);
  }
  return board;
};

// Losses over every game an opponent trying all legal replies can reach, X opening.
const countLosses = (board: BoardState, perfect: PlayerMark): number => {
  if (BoardState.isGameOver(board)) {
    return BoardState.getWinner(board) === PlayerMark.opponentOf(perfect) ? 1 : 0;
  }
  const mark = BoardState.currentPlayer(board);
  if (mark === perfect) {
    const index = choosePerfectMove(board, mark);
    return index === null ? 0 : countLosses(BoardState.setBoardCell({ board, index, mark }), perfect);
  }
  return BoardState.getEmptyCells(board).reduce(
    (losses, index) => losses + countLosses(BoardState.setBoardCell({ board, index, mark }), perfect),
    0
  );
};

describe("choosePerfectMove", async (assert) => {
  assert({
    given: "an immediate win for O",
    should: "complete the line",
    actual: choosePerfectMove("OO XX    ", "O"),
    expected: 2
  });

  assert({
    given: "X threatens the top row and O cannot win at once",
    should: "block the threat",
    actual: choosePerfectMove("XX  O    ", "O"),
    expected: 2
  });

  assert({
    given: "an empty board, where every opening draws",
    should: "pick the lowest index",
    actual: choosePerfectMove("         ", "X"),
    expected: 0
  });

  assert({
    given: "a finished game",
    should: "return null",
    actual: choosePerfectMove("XOXXOOOXX", "X"),
    expected: null
  });

  assert({
    given: "two perfect players",
    should: "end in a draw",
    actual: BoardState.deriveStatus(playOut({ X: choosePerfectMove, O: choosePerfectMove })),
    expected: "draw"
  });

  assert({
    given: "a perfect O against an easy X",
    should: "never let X win",
    actual: BoardState.getWinner(playOut({ X: chooseEasyMove, O: choosePerfectMove })) === "X",
    expected: false
  });

  assert({
    given: "perfect play as O against every sequence of X moves",
    should: "lose no game",
    actual: countLosses(BoardState.createInitialBoard(), "O"),
    expected: 0
  });

  assert({
    given: "perfect play as X against every sequence of O replies",
    should: "lose no game",
    actual: countLosses(BoardState.createInitialBoard(), "X"),
    expected: 0
  });
});
