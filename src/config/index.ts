import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { ConfigurationError } from "../errors";
import { appConfigSchema } from "./schema";
import type { AppConfig, BlacklistConfig, ScheduleConfig } from "./schema";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(
      `failed to read config file at ${configPath}: ${message}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(
      `failed to parse YAML in ${configPath}: ${message}`,
    );
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(
      `invalid configuration in ${configPath}:\n${issues}`,
    );
  }

  return result.data;
}

/**
 * Hours of the day a publish cycle runs at, starting from
 * `firstUpdateAtHour` and stepping by `updateEveryHours` until midnight.
 */
export function scheduledHours(schedule: ScheduleConfig): Array<number> {
  const hours: Array<number> = [];
  for (
    let hour = schedule.firstUpdateAtHour;
    hour < 24;
    hour += schedule.updateEveryHours
  ) {
    hours.push(hour);
  }
  return hours;
}

export function resolveCronExpression(schedule: ScheduleConfig): string {
  if (schedule.cron) return schedule.cron;
  return `0 ${scheduledHours(schedule).join(",")} * * *`;
}

/**
 * Reads a required secret from the environment.
 */
export function requireEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`${name} is not set`);
  }
  return value;
}

export type { AppConfig, BlacklistConfig, ScheduleConfig };
