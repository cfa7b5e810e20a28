export type GameStatus = "in_progress" | "won" | "draw" | "abandoned";
