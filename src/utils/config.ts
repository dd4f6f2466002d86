/**
 * Configuration management
 */

import { z } from 'zod';
import { ConfigError } from '../types/error.types.js';

/**
 * Opaque key-value source the configuration is read from
 */
export interface ConfigSource {
  get(key: string): string | undefined;
}

export function envConfigSource(env: NodeJS.ProcessEnv = process.env): ConfigSource {
  return {
    get: (key) => {
      const value = env[key];
      return value === undefined || value.trim() === '' ? undefined : value.trim();
    },
  };
}

export function mapConfigSource(values: Record<string, string | undefined>): ConfigSource {
  return {
    get: (key) => values[key],
  };
}

export const ConfigSchema = z.object({
  endpoint: z.string().optional(),
  apiKey: z.string().optional(),
  modelDeployment: z.string().optional(),
  apiVersion: z.string().default('v1'),
  executionMode: z.enum(['auto', 'managed', 'fallback']).default('auto'),
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  retryDelayMs: z.coerce.number().int().min(0).default(1000),
  retryMaxDelayMs: z.coerce.number().int().min(0).default(10000),
  maxConcurrentFormats: z.coerce.number().int().min(1).max(16).default(2),
  outputDir: z.string().default('./outputs'),
  runPollIntervalMs: z.coerce.number().int().min(10).default(1000),
  runTimeoutMs: z.coerce.number().int().min(1000).default(300000),
});

export type Config = z.infer<typeof ConfigSchema>;

const ENV_KEYS: Record<keyof Config, string> = {
  endpoint: 'AGENTS_ENDPOINT',
  apiKey: 'AGENTS_API_KEY',
  modelDeployment: 'AGENTS_MODEL_DEPLOYMENT',
  apiVersion: 'AGENTS_API_VERSION',
  executionMode: 'DOCWEAVE_EXECUTION_MODE',
  maxAttempts: 'DOCWEAVE_MAX_ATTEMPTS',
  retryDelayMs: 'DOCWEAVE_RETRY_DELAY_MS',
  retryMaxDelayMs: 'DOCWEAVE_RETRY_MAX_DELAY_MS',
  maxConcurrentFormats: 'DOCWEAVE_MAX_CONCURRENT_FORMATS',
  outputDir: 'DOCWEAVE_OUTPUT_DIR',
  runPollIntervalMs: 'DOCWEAVE_RUN_POLL_INTERVAL_MS',
  runTimeoutMs: 'DOCWEAVE_RUN_TIMEOUT_MS',
};

export const DEFAULT_MODEL_DEPLOYMENT = 'gpt-4o-mini';

/**
 * Load configuration from a key-value source
 */
export function loadConfig(source: ConfigSource = envConfigSource()): Config {
  const raw: Record<string, string | undefined> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    raw[field] = source.get(key);
  }

  // The deployment only defaults when a runtime endpoint is configured at all
  if (raw['endpoint'] !== undefined && raw['modelDeployment'] === undefined) {
    raw['modelDeployment'] = DEFAULT_MODEL_DEPLOYMENT;
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = String(issue.path[0]);
      const key = Object.entries(ENV_KEYS).find(([name]) => name === field)?.[1] ?? field;
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, 'invalid-option', { issues });
  }

  return result.data;
}
