export type MoveRejectReason = "index_out_of_bounds" | "game_over" | "cell_occupied";
