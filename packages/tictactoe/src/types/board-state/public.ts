export { schema } from "./board-state-schema.js";
export * from "./board-state-constants.js";
export * from "./create-initial-board.js";
export * from "./set-board-cell.js";
export * from "./current-player.js";
export * from "./get-move-count.js";
export * from "./get-empty-cells.js";
export * from "./is-board-full.js";
export * from "./get-winning-line.js";
export * from "./get-winner.js";
export * from "./derive-status.js";
export * from "./is-game-over.js";
