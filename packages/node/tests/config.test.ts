/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
    });
  });

  it("coerces the port and keeps the books file", () => {
    const config = loadConfig({
      PORT: "8080",
      BOOKS_FILE: "/var/lib/tallybook/books.json",
      DEFAULT_USER: "bookkeeper",
    });
    expect(config.PORT).toBe(8080);
    expect(config.BOOKS_FILE).toBe("/var/lib/tallybook/books.json");
    expect(config.DEFAULT_USER).toBe("bookkeeper");
  });

  it("treats a blank BOOKS_FILE as unset", () => {
    expect(loadConfig({ BOOKS_FILE: "   " }).BOOKS_FILE).toBeUndefined();
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});
