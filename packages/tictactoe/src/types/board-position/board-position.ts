/** What a player types to pick a cell: 1-9, left to right, top to bottom. */
export type BoardPosition = number;
export * as BoardPosition from "./public.js";
