/**
 * Centralized configuration management.
 *
 * Values come from environment variables, validated with zod. Nothing is
 * read until `getConfig()` is first called, so importing the library never
 * fails on settings it does not use.
 *
 * Usage:
 *   import { getConfig } from './core/config.js';
 *   const client = AdeClient.fromConfig(getConfig().ade);
 */

import { z } from 'zod';
import { ConfigurationError } from './exceptions.js';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'SILENT'] as const;

/**
 * Parse API connection settings
 */
const adeConfigSchema = z.object({
  apiKey: z.string().optional(),
  region: z.string().default('us'),
  baseUrl: z.string().url('ADE_BASE_URL must be a valid URL').optional(),
  timeoutMs: z.coerce
    .number()
    .int('ADE_TIMEOUT_MS must be an integer')
    .positive('ADE_TIMEOUT_MS must be positive')
    .default(300_000),
});

/**
 * Main configuration schema
 */
const appConfigSchema = z.object({
  ade: adeConfigSchema,
  isDevelopment: z.boolean(),
  logLevel: z.enum(LOG_LEVELS).default('INFO'),
});

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    ade: {
      apiKey: nonEmpty(env.ADE_API_KEY) ?? nonEmpty(env.LANDINGAI_API_KEY),
      region: nonEmpty(env.ADE_REGION),
      baseUrl: nonEmpty(env.ADE_BASE_URL),
      timeoutMs: nonEmpty(env.ADE_TIMEOUT_MS),
    },
    isDevelopment: env.NODE_ENV !== 'production',
    logLevel: nonEmpty(env.LOG_LEVEL)?.toUpperCase(),
  };

  const result = appConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

let cachedConfig: AppConfig | null = null;

/**
 * Validated configuration for the current process, loaded on first use
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Forget the loaded configuration so the next `getConfig()` reads the
 * environment again
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export type AdeConfig = z.infer<typeof adeConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type LogLevelName = (typeof LOG_LEVELS)[number];
