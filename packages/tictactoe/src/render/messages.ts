import type { MoveRejectReason } from "../types/move-reject-reason.js";
import type { PositionRejectReason } from "../types/board-position/position-reject-reason.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";
import type { Scoreboard } from "../session/scoreboard.js";

export const title = "Tic-Tac-Toe";
export const positionGuideHeading = "Positions:";
export const boardHeading = "Current Board:";
export const invalidInput = "Invalid input. Please try again.";
export const draw = "It's a draw!";
export const abandoned = "Game abandoned.";
export const playAgainPrompt = "Play again? (y/n) ";

export const promptFor = (mark: PlayerMark): string => `Player ${mark}, enter a position (1-9): `;

export const winnerIs = (mark: PlayerMark): string => `Player ${mark} wins!`;

export const computerChose = (mark: PlayerMark, position: number): string => `Player ${mark} chooses ${position}`;

export const rejectionReasons: Readonly<Record<MoveRejectReason | PositionRejectReason, string>> = {
  not_a_number: "Enter a single number from 1 to 9.",
  position_out_of_bounds: "There are only positions 1 to 9.",
  index_out_of_bounds: "There are only positions 1 to 9.",
  cell_occupied: "That cell is already taken.",
  game_over: "The game is already over."
};

export const formatScoreboard = ({ X, O, draws }: Scoreboard): string =>
  `Score: X ${X} - O ${O} - draws ${draws}`;
