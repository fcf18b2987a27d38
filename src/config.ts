/**
 * Runtime configuration from environment variables (optionally via .env)
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const EnvSchema = z.object({
  CALC_MAX_HISTORY: z.coerce.number().int().min(1).default(100).describe("History capacity"),
  CALC_HISTORY_DISPLAY: z.coerce
    .number()
    .int()
    .min(1)
    .default(10)
    .describe("Entries shown by the history command"),
  CALC_MAX_FACTORIAL: z.coerce
    .number()
    .int()
    .min(0)
    .default(10_000)
    .describe("Largest factorial argument accepted"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
});

export interface AppConfig {
  maxHistory: number;
  historyDisplayLimit: number;
  maxFactorial: number;
  logLevel: (typeof LOG_LEVELS)[number];
  host: string;
  port: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.issues = issues;
    this.name = "ConfigError";
  }
}

/**
 * Validate env vars into a typed config. Throws ConfigError listing every bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    maxHistory: vars.CALC_MAX_HISTORY,
    historyDisplayLimit: vars.CALC_HISTORY_DISPLAY,
    maxFactorial: vars.CALC_MAX_FACTORIAL,
    logLevel: vars.LOG_LEVEL,
    host: vars.HOST,
    port: vars.PORT,
  });
}

/** Load .env into process.env (existing variables win), then validate */
export function loadConfigFromEnvironment(): Readonly<AppConfig> {
  loadDotenv();
  return loadConfig(process.env);
}
