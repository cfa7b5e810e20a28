import { createInterface } from "node:readline";
import type { GameInput } from "./game-io.js";

export interface ReadlineInput extends GameInput {
  readonly close: () => void;
}

export const createReadlineInput = ({
  input = process.stdin,
  output = process.stdout
}: {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
} = {}): ReadlineInput => {
  const rl = createInterface({ input, output });
  // Ctrl-C ends input the same way Ctrl-D does, abandoning the current game.
  rl.on("SIGINT", () => rl.close());
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });
  const lines = rl[Symbol.asyncIterator]();

  return {
    readLine: async (prompt) => {
      if (closed) {
        return null;
      }
      // readline redraws the prompt it owns after every edit.
      rl.setPrompt(prompt);
      rl.prompt();
      const next = await lines.next();
      return next.done === true ? null : next.value;
    },
    close: () => rl.close()
  };
};
