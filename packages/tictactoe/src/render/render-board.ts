import { BoardState } from "../types/board-state/board-state.js";

const rowSeparator = "---+---+---";

const renderRow = (cells: readonly string[]): string => ` ${cells.join(" | ")} `;

const renderGrid = (cells: readonly string[]): string => {
  const rows: string[] = [];
  for (let start = 0; start < cells.length; start += BoardState.SIDE) {
    rows.push(renderRow(cells.slice(start, start + BoardState.SIDE)));
  }
  return rows.join(`\n${rowSeparator}\n`);
};

export const renderBoard = (board: BoardState): string => renderGrid([...board]);

export const renderPositionGuide = (): string =>
  renderGrid(Array.from({ length: BoardState.CELL_COUNT }, (_, index) => String(index + 1)));
