export interface PlayMoveArgs {
  readonly index: number;
}
export * as PlayMoveArgs from "./public.js";
