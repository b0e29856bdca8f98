import { pino } from "pino";
import { loadConfig, type TearoffConfig } from "./config";

export interface ILogger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

export const makeLogger = (
  config: TearoffConfig = loadConfig(),
  name = "tearoff",
): ILogger =>
  pino({
    name,
    level: config.logLevel,
    ...(config.prettyLogs
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

let defaultLogger: ILogger | undefined;

/** Process-wide logger built from the environment on first use. */
export const logger = (): ILogger => (defaultLogger ??= makeLogger());
