import { describe } from "riteway/esm/riteway.js";
import { renderBoard, renderPositionGuide } from "./render-board.js";

describe("renderBoard", async (assert) => {
  assert({
    given: "an empty board",
    should: "render three blank rows separated by dividers",
    actual: renderBoard("         "),
    expected: ["   |   |   ", "---+---+---", "   |   |   ", "---+---+---", "   |   |   "].join("\n")
  });

  assert({
    given: "X across the top row and two O marks",
    should: "render each mark in its cell",
    actual: renderBoard("XXXOO    "),
    expected: [" X | X | X ", "---+---+---", " O | O |   ", "---+---+---", "   |   |   "].join("\n")
  });
});

describe("renderPositionGuide", async (assert) => {
  assert({
    given: "no arguments",
    should: "number the cells 1 to 9",
    actual: renderPositionGuide(),
    expected: [" 1 | 2 | 3 ", "---+---+---", " 4 | 5 | 6 ", "---+---+---", " 7 | 8 | 9 "].join("\n")
  });
});
