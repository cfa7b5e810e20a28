export type PositionRejectReason = "not_a_number" | "position_out_of_bounds";
