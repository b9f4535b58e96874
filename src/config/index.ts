import fs from "fs";
import { z } from "zod";
import { InvalidParameterError, describeIssues } from "../errors";
import { WWO_PAST_WEATHER_URL } from "../modules/historyClient";
import { DEFAULT_MAX_WINDOW_DAYS } from "../modules/weatherFetcher";

/**
 * Docker secrets arrive as a path under /run/secrets; anything else is the
 * literal value.
 */
export function resolveSecret(value: string): string {
  if (value.startsWith("/run/secrets/")) {
    return fs.readFileSync(value, "utf8").trim();
  }
  return value;
}

const envSchema = z.object({
  WWO_API_KEY: z.string().min(1),
  WWO_LOCATION: z.string().min(1),
  WWO_START_DATE: z.string().min(1),
  WWO_END_DATE: z.string().min(1),
  WWO_FREQUENCY: z.coerce.number().int().default(12),
  WWO_OUTPUT_DIR: z.string().min(1).optional(),
  WWO_VERBOSE: z.enum(["true", "false"]).default("true"),
  WWO_BASE_URL: z.string().url().default(WWO_PAST_WEATHER_URL),
  WWO_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WWO_MAX_WINDOW_DAYS: z.coerce.number().int().positive().default(DEFAULT_MAX_WINDOW_DAYS),
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export interface AppConfig {
  apiKey: string;
  location: string;
  startDate: string;
  endDate: string;
  frequency: number;
  outputDir?: string;
  verbose: boolean;
  baseUrl: string;
  timeoutMs: number;
  maxWindowDays: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new InvalidParameterError(
      `Invalid environment: ${describeIssues(parsed.error.issues)}`,
      parsed.error.issues
    );
  }

  const vars = parsed.data;

  return {
    apiKey: resolveSecret(vars.WWO_API_KEY),
    location: vars.WWO_LOCATION,
    startDate: vars.WWO_START_DATE,
    endDate: vars.WWO_END_DATE,
    frequency: vars.WWO_FREQUENCY,
    outputDir: vars.WWO_OUTPUT_DIR,
    verbose: vars.WWO_VERBOSE === "true",
    baseUrl: vars.WWO_BASE_URL,
    timeoutMs: vars.WWO_TIMEOUT_MS,
    maxWindowDays: vars.WWO_MAX_WINDOW_DAYS,
  };
}
