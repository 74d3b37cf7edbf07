/**
 * Configuration: host config object → environment → defaults.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { defaultFilterDir } from './filters.js';
import type { LogLevel } from './logger.js';

export const ConfigSchema = z.object({
  pandocPath: z.string().min(1).optional(),
  sandboxDir: z.string().min(1).optional(),
  filterDir: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  pandocPath?: string;
  sandboxDir?: string;
  filterDir: string;
  logLevel: LogLevel;
}

export const ENV_KEYS = {
  pandocPath: 'PANDOC_PATH',
  sandboxDir: 'CONVERT_SANDBOX_DIR',
  filterDir: 'PANDOC_FILTER_DIR',
  logLevel: 'CONVERT_LOG_LEVEL',
} as const;

/**
 * Merge host config with environment variables and validate the result.
 * Values set in `raw` win; empty strings count as unset.
 */
export function loadConfig(raw: unknown = {}, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const source = typeof raw === 'object' && raw !== null ? raw : {};
  const merged: Record<string, unknown> = { ...source };
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    if (isUnset(merged[key]) && env[envKey]) {
      merged[key] = env[envKey];
    }
    if (isUnset(merged[key])) {
      delete merged[key];
    }
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;
  return {
    pandocPath: config.pandocPath,
    sandboxDir: config.sandboxDir,
    filterDir: config.filterDir ?? defaultFilterDir(),
    logLevel: config.logLevel ?? 'info',
  };
}

function isUnset(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}
