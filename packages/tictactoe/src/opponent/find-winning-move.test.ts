import { describe } from "riteway/esm/riteway.js";
import { findWinningMove } from "./find-winning-move.js";

describe("findWinningMove", async (assert) => {
  assert({
    given: "two O marks in the middle row with the end free",
    should: "return the cell completing the row",
    actual: findWinningMove("XX OO    ", "O"),
    expected: 5
  });

  assert({
    given: "no line one move from completion",
    should: "return null",
    actual: findWinningMove("X   O    ", "X"),
    expected: null
  });
});
