import type { Schema } from "@adobe/data/schema";

export const logLevelSchema = {
  type: "string",
  enum: ["silent", "info", "debug"],
  description: "Diagnostics written to stderr while playing."
} as const satisfies Schema;

export type LogLevel = Schema.ToType<typeof logLevelSchema>;

export interface Logger {
  readonly info: (message: string) => void;
  readonly debug: (message: string) => void;
}

const rank: Readonly<Record<LogLevel, number>> = { silent: 0, info: 1, debug: 2 };

const prefix = "[tictactoe]";

/** Writes to stderr by default so diagnostics never interleave with the board on stdout. */
export const createLogger = ({
  level,
  write = console.error
}: {
  readonly level: LogLevel;
  readonly write?: (line: string) => void;
}): Logger => {
  const enabled = (needed: LogLevel): boolean => rank[level] >= rank[needed];

  return {
    info: (message) => {
      if (enabled("info")) {
        write(`${prefix} ${message}`);
      }
    },
    debug: (message) => {
      if (enabled("debug")) {
        write(`${prefix} debug: ${message}`);
      }
    }
  };
};
