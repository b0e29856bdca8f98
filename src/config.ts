import { object, optional, parse, picklist } from "valibot";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LEVELS)[number];

export interface TearoffConfig {
  logLevel: LogLevel;
  prettyLogs: boolean;
}

const envSchema = object({
  LOG_LEVEL: optional(picklist(LEVELS), "info"),
  LOG_PRETTY: optional(picklist(["true", "false", "1", "0"]), "false"),
});

/** Reads logging settings from the environment; throws `ValiError` on bad values. */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): TearoffConfig => {
  const parsed = parse(envSchema, {
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_PRETTY: env.LOG_PRETTY,
  });
  return {
    logLevel: parsed.LOG_LEVEL,
    prettyLogs: parsed.LOG_PRETTY === "true" || parsed.LOG_PRETTY === "1",
  };
};
