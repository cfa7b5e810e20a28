export * from "./parse-board-position.js";
export * from "./to-board-position.js";
