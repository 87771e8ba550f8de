/**
 * Configuration Loader
 *
 * Reads SAMPLE_SIZE_* environment variables, validates them with zod and
 * falls back to the defaults in ./defaults.
 */

import { z } from 'zod';
import { SampleSizeError, ErrorCode } from '../core/errors';
import { DEFAULT_LOG_LEVEL, SIZING_DEFAULTS } from './defaults';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Maps each environment variable to the config field it sets
 */
const ENV_KEYS = {
  logLevel: 'SAMPLE_SIZE_LOG_LEVEL',
  defaultPower: 'SAMPLE_SIZE_DEFAULT_POWER',
  defaultAlpha: 'SAMPLE_SIZE_DEFAULT_ALPHA',
  defaultSides: 'SAMPLE_SIZE_DEFAULT_SIDES',
  defaultTestType: 'SAMPLE_SIZE_DEFAULT_TEST_TYPE',
} as const;

const optionalNumber = z.coerce.number().finite();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
  defaultPower: optionalNumber
    .gt(0, 'must be between 0 and 1')
    .lt(1, 'must be between 0 and 1')
    .default(SIZING_DEFAULTS.POWER),
  defaultAlpha: optionalNumber
    .gt(0, 'must be between 0 and 1')
    .lt(1, 'must be between 0 and 1')
    .default(SIZING_DEFAULTS.ALPHA),
  defaultSides: z.coerce
    .number()
    .refine((value) => value === 1 || value === 2, 'must be 1 or 2')
    .transform((value): 1 | 2 => (value === 1 ? 1 : 2))
    .default(SIZING_DEFAULTS.SIDES),
  defaultTestType: z.enum(['z', 't']).default(SIZING_DEFAULTS.TEST_TYPE),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

type Environment = Record<string, string | undefined>;

/**
 * Build the runtime configuration from an environment.
 * Empty variables count as unset.
 *
 * @throws SampleSizeError with INVALID_CONFIG listing every bad variable
 */
export function loadConfig(env: Environment = process.env): RuntimeConfig {
  const raw: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) {
      raw[field] = value;
    }
  }

  const parsed = RuntimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => {
      const field = String(issue.path[0]);
      const envKey = Object.entries(ENV_KEYS).find(([key]) => key === field)?.[1] ?? field;
      return `${envKey}: ${issue.message}`;
    });

    throw new SampleSizeError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration:\n${errors.join('\n')}`,
      { errors }
    );
  }

  return parsed.data;
}

let cachedConfig: RuntimeConfig | null = null;

/**
 * Process-wide configuration, loaded on first use
 */
export function getConfig(): RuntimeConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration (tests change the environment between runs)
 */
export function resetConfig(): void {
  cachedConfig = null;
}
