import { BoardState } from "../board-state/board-state.js";
import type { MoveRejectReason } from "../move-reject-reason.js";

export interface CanPlayMoveArgs {
  readonly board: BoardState;
  readonly index: number;
}

export type CanPlayMoveResult = { readonly ok: true } | { readonly ok: false; readonly reason: MoveRejectReason };

export const canPlayMove = ({ board, index }: CanPlayMoveArgs): CanPlayMoveResult => {
  if (!Number.isInteger(index) || index < 0 || index >= BoardState.CELL_COUNT) {
    return { ok: false, reason: "index_out_of_bounds" };
  }

  if (BoardState.isGameOver(board)) {
    return { ok: false, reason: "game_over" };
  }

  if (board[index] !== BoardState.EMPTY_CELL) {
    return { ok: false, reason: "cell_occupied" };
  }

  return { ok: true };
};
