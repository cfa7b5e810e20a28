export * from "./can-play-move.js";
