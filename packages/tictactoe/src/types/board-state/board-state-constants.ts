export const SIDE = 3;
export const CELL_COUNT = SIDE * SIDE;
export const EMPTY_CELL = " ";
