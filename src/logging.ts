import pino from "pino";

/** The slice of a pino logger the client components write to. */
export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error">;

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  pretty = false,
): pino.Logger =>
  pino({
    name: "tickwire",
    level,
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });
