import { BoardState } from "../types/board-state/board-state.js";
import { PlayerMark } from "../types/player-mark/player-mark.js";

const winScore = 10;

interface SearchArgs {
  readonly board: BoardState;
  /** The player the score is measured for. */
  readonly mark: PlayerMark;
  readonly toMove: PlayerMark;
  readonly depth: number;
  readonly alpha: number;
  readonly beta: number;
}

// Wins score higher the sooner they happen, losses higher the later.
const scoreFinishedBoard = (board: BoardState, mark: PlayerMark, depth: number): number | null => {
  const winner = BoardState.getWinner(board);
  if (winner !== null) {
    return winner === mark ? winScore - depth : depth - winScore;
  }
  return BoardState.isBoardFull(board) ? 0 : null;
};

const search = ({ board, mark, toMove, depth, alpha, beta }: SearchArgs): number => {
  const finished = scoreFinishedBoard(board, mark, depth);
  if (finished !== null) {
    return finished;
  }

  const maximizing = toMove === mark;
  let best = maximizing ? -Infinity : Infinity;
  let low = alpha;
  let high = beta;

  for (const index of BoardState.getEmptyCells(board)) {
    const score = search({
      board: BoardState.setBoardCell({ board, index, mark: toMove }),
      mark,
      toMove: PlayerMark.opponentOf(toMove),
      depth: depth + 1,
      alpha: low,
      beta: high
    });

    if (maximizing) {
      best = Math.max(best, score);
      low = Math.max(low, best);
    } else {
      best = Math.min(best, score);
      high = Math.min(high, best);
    }

    if (high <= low) {
      break;
    }
  }

  return best;
};

/**
 * Minimax with alpha-beta pruning over the full game tree. Each root move is
 * searched with an open window so its score is exact; ties go to the lowest index.
 */
export const choosePerfectMove = (board: BoardState, mark: PlayerMark): number | null => {
  if (BoardState.isGameOver(board)) {
    return null;
  }

  let bestIndex: number | null = null;
  let bestScore = -Infinity;

  for (const index of BoardState.getEmptyCells(board)) {
    const score = search({
      board: BoardState.setBoardCell({ board, index, mark }),
      mark,
      toMove: PlayerMark.opponentOf(mark),
      depth: 1,
      alpha: -Infinity,
      beta: Infinity
    });
    if (score > bestScore) {
      bestScore = score;
      bestIndex = index;
    }
  }

  return bestIndex;
};
