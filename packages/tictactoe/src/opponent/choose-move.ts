import type { BoardState } from "../types/board-state/board-state.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";
import type { Difficulty } from "./difficulty.js";
import { chooseEasyMove } from "./choose-easy-move.js";
import { choosePerfectMove } from "./choose-perfect-move.js";

export interface ChooseMoveArgs {
  readonly board: BoardState;
  readonly mark: PlayerMark;
  readonly difficulty: Difficulty;
}

const strategies: Readonly<Record<Difficulty, (board: BoardState, mark: PlayerMark) => number | null>> = {
  easy: chooseEasyMove,
  perfect: choosePerfectMove
};

export const chooseMove = ({ board, mark, difficulty }: ChooseMoveArgs): number | null =>
  strategies[difficulty](board, mark);
