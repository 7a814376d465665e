import pino from "pino";

export type LogLevel = pino.LevelWithSilent;

export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error">;

export const makeLogger = (level: LogLevel = "info"): ILogger =>
  level === "silent"
    ? pino({ level })
    : pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      });
