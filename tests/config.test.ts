import { describe, it, expect } from "vitest";
import { ValiError } from "valibot";
import { loadConfig } from "../src/config";
import { makeLogger } from "../src/logging";

describe("loadConfig", () => {
  it("defaults to info without pretty output", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", prettyLogs: false });
  });

  it("reads level and pretty flag", () => {
    expect(loadConfig({ LOG_LEVEL: "debug", LOG_PRETTY: "1" })).toEqual({
      logLevel: "debug",
      prettyLogs: true,
    });
    expect(loadConfig({ LOG_LEVEL: "silent", LOG_PRETTY: "false" }).prettyLogs).toBe(false);
  });

  it("rejects unknown values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ValiError);
    expect(() => loadConfig({ LOG_PRETTY: "yes" })).toThrow(ValiError);
  });
});

describe("makeLogger", () => {
  it("honours the configured level", () => {
    const log = makeLogger({ logLevel: "warn", prettyLogs: false }, "test");
    expect("level" in log && log.level).toBe("warn");
  });
});
