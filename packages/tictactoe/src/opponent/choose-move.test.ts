import { describe } from "riteway/esm/riteway.js";
import { chooseMove } from "./choose-move.js";

describe("chooseMove", async (assert) => {
  assert({
    given: "easy difficulty on an empty board",
    should: "take the centre",
    actual: chooseMove({ board: "         ", mark: "X", difficulty: "easy" }),
    expected: 4
  });

  assert({
    given: "perfect difficulty on an empty board",
    should: "take the first cell",
    actual: chooseMove({ board: "         ", mark: "X", difficulty: "perfect" }),
    expected: 0
  });
});
