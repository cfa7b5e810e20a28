export interface GameInput {
  /** Resolves to the next line typed, or null once input has closed. */
  readonly readLine: (prompt: string) => Promise<string | null>;
}

export interface GameOutput {
  readonly write: (text: string) => void;
}

export const writeLine = (output: GameOutput, text = ""): void => output.write(`${text}\n`);
