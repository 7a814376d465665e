import * as v from "valibot";
import { ConfigError } from "./core/errors";
import type { LogLevel } from "./logging";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LogLevel[];

const EnvSchema = v.object({
  SCHEDULER_MAX_TASKS_PER_HEIGHT: v.optional(
    v.pipe(
      v.string(),
      v.digits("SCHEDULER_MAX_TASKS_PER_HEIGHT must be a positive integer"),
      v.transform(Number),
      v.safeInteger(),
      v.minValue(1, "SCHEDULER_MAX_TASKS_PER_HEIGHT must be at least 1"),
    ),
    "16",
  ),
  LOG_LEVEL: v.optional(v.picklist(LOG_LEVELS), "info"),
});

export type SchedulerConfig = {
  maxTasksPerHeight: number;
  logLevel: LogLevel;
};

export const DEFAULT_MAX_TASKS_PER_HEIGHT = 16;

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): SchedulerConfig => {
  const res = v.safeParse(EnvSchema, {
    SCHEDULER_MAX_TASKS_PER_HEIGHT: env.SCHEDULER_MAX_TASKS_PER_HEIGHT,
    LOG_LEVEL: env.LOG_LEVEL,
  });
  if (!res.success) {
    const detail = res.issues
      .map((i) => `${v.getDotPath(i) ?? "config"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${detail}`);
  }
  return {
    maxTasksPerHeight: res.output.SCHEDULER_MAX_TASKS_PER_HEIGHT,
    logLevel: res.output.LOG_LEVEL,
  };
};
