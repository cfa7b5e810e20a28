import { CELL_COUNT } from "../board-state/board-state-constants.js";
import type { PositionRejectReason } from "./position-reject-reason.js";

export type ParseBoardPositionResult =
  | { readonly ok: true; readonly index: number }
  | { readonly ok: false; readonly reason: PositionRejectReason };

const digitsOnly = /^[0-9]+$/;

export const parseBoardPosition = (input: string): ParseBoardPositionResult => {
  const trimmed = input.trim();
  if (!digitsOnly.test(trimmed)) {
    return { ok: false, reason: "not_a_number" };
  }

  const position = Number(trimmed);
  if (position < 1 || position > CELL_COUNT) {
    return { ok: false, reason: "position_out_of_bounds" };
  }

  return { ok: true, index: position - 1 };
};
