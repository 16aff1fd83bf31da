import { z } from 'zod';
import { ConfigError } from './errors';
import { formatZodIssues } from './schemas';

const TRUTHY = ['true', '1', 'yes', 'on'];

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DEFAULT_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  ENABLE_SESSIONS: z
    .string()
    .default('true')
    .transform((value) => TRUTHY.includes(value.trim().toLowerCase())),
  SESSION_DIR: z.string().min(1).default('./.sessions'),
  SKILLGRAPH_PROFILES: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Read settings from the environment. Unset variables take their defaults.
 *
 * @throws ConfigError when a variable is set to something unusable
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL?.toLowerCase() || undefined,
    DEFAULT_MODEL: env.DEFAULT_MODEL || undefined,
    ENABLE_SESSIONS: env.ENABLE_SESSIONS || undefined,
    SESSION_DIR: env.SESSION_DIR || undefined,
    SKILLGRAPH_PROFILES: env.SKILLGRAPH_PROFILES || undefined,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatZodIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}
