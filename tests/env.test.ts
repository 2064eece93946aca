import { describe, expect, it } from "vitest";

import { InvalidEnvironmentError, parseEnv, resolveLogLevel } from "@/lib/config/env";

describe("environment config", () => {
  it("applies defaults", () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: "development",
      IMMERSION_API_BASE_URL: "https://provider.example.com/api",
      IMMERSION_API_TIMEOUT_MS: 15000
    });
  });

  it("coerces the timeout from a string", () => {
    expect(parseEnv({ IMMERSION_API_TIMEOUT_MS: "30000" }).IMMERSION_API_TIMEOUT_MS).toBe(30000);
  });

  it("rejects out-of-range and malformed values", () => {
    expect(() => parseEnv({ IMMERSION_API_TIMEOUT_MS: "500" })).toThrow(InvalidEnvironmentError);
    expect(() => parseEnv({ IMMERSION_API_BASE_URL: "not-a-url" })).toThrow(/IMMERSION_API_BASE_URL/);
  });

  it("resolves the log level per environment", () => {
    expect(resolveLogLevel(parseEnv({ NODE_ENV: "test" }))).toBe("silent");
    expect(resolveLogLevel(parseEnv({ NODE_ENV: "production" }))).toBe("info");
    expect(resolveLogLevel(parseEnv({ NODE_ENV: "test", LOG_LEVEL: "debug" }))).toBe("debug");
  });
});
