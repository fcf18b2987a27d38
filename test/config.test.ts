/**
 * Tests for environment configuration
 */

import { describe, expect, test } from "vitest";
import { ConfigError, loadConfig } from "../src/config.ts";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      maxHistory: 100,
      historyDisplayLimit: 10,
      maxFactorial: 10_000,
      logLevel: "info",
      host: "0.0.0.0",
      port: 5000,
    });
  });

  test("reads and coerces variables", () => {
    const config = loadConfig({
      CALC_MAX_HISTORY: "5",
      CALC_HISTORY_DISPLAY: "3",
      CALC_MAX_FACTORIAL: "50",
      LOG_LEVEL: "debug",
      HOST: "127.0.0.1",
      PORT: "8080",
    });

    expect(config).toEqual({
      maxHistory: 5,
      historyDisplayLimit: 3,
      maxFactorial: 50,
      logLevel: "debug",
      host: "127.0.0.1",
      port: 8080,
    });
  });

  test("result is frozen", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  test("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin", HOME: "/home/test" }).port).toBe(5000);
  });

  test("lists every invalid variable", () => {
    try {
      loadConfig({ CALC_MAX_HISTORY: "0", PORT: "abc" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]?.startsWith("CALC_MAX_HISTORY: ")).toBe(true);
        expect(error.issues[1]?.startsWith("PORT: ")).toBe(true);
        expect(error.message.startsWith("Invalid configuration:\n  CALC_MAX_HISTORY: ")).toBe(true);
      }
    }
  });

  test("unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });

  test("port out of range", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ConfigError);
  });
});
