import pino from "pino";

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  opts: { pretty?: boolean } = {},
): ILogger =>
  opts.pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });

export const silentLogger: ILogger = makeLogger("silent");
