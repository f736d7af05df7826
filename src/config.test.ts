import { describe, expect, it } from "vitest";
import { ENGINE_DEFAULTS, resolveEngineConfig } from "./config";
import { ConfigError } from "./core/errors";

describe("resolveEngineConfig", () => {
  it("starts from the defaults", () => {
    expect(resolveEngineConfig({}, {})).toEqual({
      logLevel: "warn",
      tombstoneRetention: ENGINE_DEFAULTS.tombstoneRetention,
      fallbackMessage: "Nothing happens.",
      saveKey: "taletick_autosave"
    });
  });

  it("reads the log level from the environment", () => {
    expect(resolveEngineConfig({}, { TALETICK_LOG_LEVEL: " DEBUG " }).logLevel).toBe("debug");
    expect(resolveEngineConfig({ logLevel: "error" }, { TALETICK_LOG_LEVEL: "debug" }).logLevel).toBe("error");
  });

  it("rejects invalid values", () => {
    expect(() => resolveEngineConfig({}, { TALETICK_LOG_LEVEL: "loud" })).toThrow(ConfigError);
    expect(() => resolveEngineConfig({ tombstoneRetention: -1 }, {})).toThrow(ConfigError);
  });
});
