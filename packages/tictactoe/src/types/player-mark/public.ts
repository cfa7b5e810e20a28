export { schema } from "./player-mark-schema.js";
export * from "./opponent-of.js";
export * from "./is-player-mark.js";
