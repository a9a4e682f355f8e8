import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../../src/server/config";

describe("loadConfig", () => {
  it("fills defaults", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }, false)).toEqual({
      HOST: "0.0.0.0",
      PORT: 8010,
      BOT_TIMEOUT_MS: 120000,
      BOT_MAX_STEPS: 500,
      CHAT_MAX_LENGTH: 300,
      CHAT_RECENT: 30,
      LOG_LEVEL: "silent"
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PORT: "9000", BOT_TIMEOUT_MS: "250", LOG_LEVEL: "silent" }, false);
    expect(config.PORT).toBe(9000);
    expect(config.BOT_TIMEOUT_MS).toBe(250);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port", LOG_LEVEL: "silent" }, false)).toThrowError(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" }, false)).toThrowError(ZodError);
  });
});
