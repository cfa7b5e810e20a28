import { describe } from "riteway/esm/riteway.js";
import { runSessions } from "./run-sessions.js";
import { createScriptedSession } from "./session-test-support.js";

describe("runSessions", async (assert) => {
  {
    const session = createScriptedSession(["1", "4", "2", "5", "3"]);
    const scoreboard = await runSessions(session);

    assert({
      given: "rematches turned off",
      should: "play one game and return its score",
      actual: scoreboard,
      expected: { X: 1, O: 0, draws: 0 }
    });

    assert({
      given: "rematches turned off",
      should: "not offer another game",
      actual: session.prompts.includes("Play again? (y/n) "),
      expected: false
    });

    assert({
      given: "a new session",
      should: "open with the title",
      actual: session.written[0],
      expected: "Tic-Tac-Toe\n"
    });

    assert({
      given: "a new session",
      should: "show the numbered positions before the first board",
      actual: session.written[3],
      expected: " 1 | 2 | 3 \n---+---+---\n 4 | 5 | 6 \n---+---+---\n 7 | 8 | 9 \n"
    });
  }

  {
    const session = createScriptedSession(
      ["1", "4", "2", "5", "3", "y", "1", "4", "2", "5", "3", "n"],
      { rematch: true }
    );
    const scoreboard = await runSessions(session);

    assert({
      given: "one rematch where each side wins once",
      should: "count a win for each side",
      actual: scoreboard,
      expected: { X: 1, O: 1, draws: 0 }
    });

    assert({
      given: "a rematch",
      should: "let O open the second game",
      actual: session.prompts.slice(5, 7),
      expected: ["Play again? (y/n) ", "Player O, enter a position (1-9): "]
    });

    assert({
      given: "the second game finished",
      should: "print the running score",
      actual: session.written.at(-1),
      expected: "Score: X 1 - O 1 - draws 0\n"
    });
  }

  {
    const session = createScriptedSession(["5"], { rematch: true });
    const scoreboard = await runSessions(session);

    assert({
      given: "input closing mid-game",
      should: "return an empty score",
      actual: scoreboard,
      expected: { X: 0, O: 0, draws: 0 }
    });
  }
});
