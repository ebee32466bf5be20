import { z } from 'zod';
import { ConfigError } from './core/errors.js';
import { MAX_TIMEOUT } from './whois/query.js';

export const WhoisConfigSchema = z.object({
  server: z.string().trim().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).default(43),
  timeout: z.coerce.number().int().min(0).max(MAX_TIMEOUT).default(10000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  registryFile: z.string().trim().min(1).optional(),
});

export type WhoisConfig = z.infer<typeof WhoisConfigSchema>;

export type ConfigInput = z.input<typeof WhoisConfigSchema>;

/**
 * Environment variable for each config key
 */
export const ENV_KEYS = {
  server: 'WHOIS_SERVER',
  port: 'WHOIS_PORT',
  timeout: 'WHOIS_TIMEOUT',
  logLevel: 'WHOIS_LOG_LEVEL',
  registryFile: 'WHOIS_REGISTRY',
} as const satisfies Record<keyof WhoisConfig, string>;

/**
 * Resolve configuration from the environment, with explicit overrides
 * (usually CLI flags) taking precedence. Undefined overrides are ignored.
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof WhoisConfig, string | number | undefined>> = {}
): WhoisConfig {
  const input: Record<string, string | number> = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      input[key] = value;
    }
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      input[key] = value;
    }
  }

  const parsed = WhoisConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
