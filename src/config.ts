/**
 * Environment configuration loading and validation.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export const DEFAULT_NCBI_TOOL = "accession-metadata";

/** Treat empty strings as unset so that `FOO=` in a .env file falls back to the default. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const logLevel = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === "" ? "info" : value.toLowerCase()))
  .pipe(z.enum(["debug", "info", "warn", "error"]));

export const EnvSchema = z.object({
  NCBI_API_KEY: optionalString,
  NCBI_EMAIL: optionalString.pipe(z.string().email().optional()),
  NCBI_TOOL: optionalString,
  ACCESSION_METADATA_CONCURRENCY: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? "1" : value))
    .pipe(z.coerce.number().int().min(1).max(16)),
  LOG_LEVEL: logLevel,
});

export interface AppConfig {
  ncbiApiKey?: string;
  ncbiEmail?: string;
  ncbiTool: string;
  concurrency: number;
  logLevel: LogLevel;
}

/**
 * Read configuration from environment variables.
 * Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const data = parsed.data;
  const config: AppConfig = {
    ncbiTool: data.NCBI_TOOL ?? DEFAULT_NCBI_TOOL,
    concurrency: data.ACCESSION_METADATA_CONCURRENCY,
    logLevel: data.LOG_LEVEL,
  };
  if (data.NCBI_API_KEY) config.ncbiApiKey = data.NCBI_API_KEY;
  if (data.NCBI_EMAIL) config.ncbiEmail = data.NCBI_EMAIL;
  return config;
}
