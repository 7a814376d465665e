import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/core/errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ maxTasksPerHeight: 16, logLevel: "info" });
  });

  it("reads overrides from the environment", () => {
    expect(loadConfig({ SCHEDULER_MAX_TASKS_PER_HEIGHT: "3", LOG_LEVEL: "debug" })).toEqual({
      maxTasksPerHeight: 3,
      logLevel: "debug",
    });
  });

  it("rejects a zero cap", () => {
    expect(() => loadConfig({ SCHEDULER_MAX_TASKS_PER_HEIGHT: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ SCHEDULER_MAX_TASKS_PER_HEIGHT: "0" })).toThrow(/must be at least 1/);
  });

  it("rejects non-numeric caps and unknown log levels", () => {
    expect(() => loadConfig({ SCHEDULER_MAX_TASKS_PER_HEIGHT: "many" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});
