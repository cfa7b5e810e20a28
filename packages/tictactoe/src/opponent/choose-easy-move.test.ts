import { describe } from "riteway/esm/riteway.js";
import { chooseEasyMove } from "./choose-easy-move.js";

describe("chooseEasyMove", async (assert) => {
  assert({
    given: "an empty board",
    should: "take the centre",
    actual: chooseEasyMove("         ", "X"),
    expected: 4
  });

  assert({
    given: "the centre is taken",
    should: "take the first corner",
    actual: chooseEasyMove("    X    ", "O"),
    expected: 0
  });

  assert({
    given: "both a win and a block are available",
    should: "take the win",
    actual: chooseEasyMove("XX OO    ", "O"),
    expected: 5
  });

  assert({
    given: "the opponent threatens the top row",
    should: "block it",
    actual: chooseEasyMove("XX  O    ", "O"),
    expected: 2
  });

  assert({
    given: "a finished game",
    should: "return null",
    actual: chooseEasyMove("XXXOO    ", "O"),
    expected: null
  });
});
