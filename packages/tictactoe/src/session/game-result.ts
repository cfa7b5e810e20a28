import type { BoardState } from "../types/board-state/board-state.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";

export type GameResult =
  | { readonly status: "won"; readonly winner: PlayerMark; readonly board: BoardState }
  | { readonly status: "draw"; readonly board: BoardState }
  | { readonly status: "abandoned"; readonly board: BoardState };
