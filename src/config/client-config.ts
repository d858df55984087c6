/**
 * Client Configuration
 *
 * The numeric knobs the transport, retry engine and mutation policy read.
 * Values come from explicit overrides first, then `CDP_*` environment
 * variables, then defaults.
 */

import { z } from 'zod';
import { ErrorCode, UsageError } from '../shared/errors/index.js';

export const ClientConfigSchema = z.object({
  /** WebSocket handshake timeout (ms) */
  connectTimeoutMs: z.number().int().positive().default(10_000),
  /** Default timeout of a single protocol call (ms) */
  callTimeoutMs: z.number().int().positive().default(10_000),
  /** Default deadline for waits, navigation and mutation settling (ms) */
  waitTimeoutMs: z.number().int().nonnegative().default(10_000),
  /** Backoff between retry attempts (ms) */
  pollIntervalMs: z.number().int().positive().default(50),
  /** Pause after a mutation before activity is sampled (ms) */
  mutationGraceMs: z.number().int().nonnegative().default(100),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

const ENV_KEYS: Record<keyof ClientConfig, string> = {
  connectTimeoutMs: 'CDP_CONNECT_TIMEOUT_MS',
  callTimeoutMs: 'CDP_CALL_TIMEOUT_MS',
  waitTimeoutMs: 'CDP_WAIT_TIMEOUT_MS',
  pollIntervalMs: 'CDP_POLL_INTERVAL_MS',
  mutationGraceMs: 'CDP_MUTATION_GRACE_MS',
};

const EnvNumberSchema = z.coerce.number();

function readEnv(env: NodeJS.ProcessEnv): ClientConfigInput {
  const fromEnv: ClientConfigInput = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName];
    if (raw === undefined || raw.trim() === '') continue;

    const parsed = EnvNumberSchema.safeParse(raw);
    if (!parsed.success || Number.isNaN(parsed.data)) {
      throw new UsageError(`Invalid ${envName}: "${raw}" is not a number`, ErrorCode.INVALID_CONFIG, {
        variable: envName,
        value: raw,
      });
    }
    if (isConfigKey(key)) {
      fromEnv[key] = parsed.data;
    }
  }

  return fromEnv;
}

function isConfigKey(key: string): key is keyof ClientConfig {
  return key in ENV_KEYS;
}

/**
 * Build a validated configuration.
 *
 * @param overrides - Explicit values; these win over the environment
 * @param env - Environment to read `CDP_*` variables from
 * @throws UsageError when a value is missing its constraints
 */
export function loadClientConfig(
  overrides: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const merged: ClientConfigInput = readEnv(env);
  for (const key of Object.keys(ENV_KEYS).filter(isConfigKey)) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = ClientConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new UsageError(`Invalid client configuration: ${issues.join('; ')}`, ErrorCode.INVALID_CONFIG, {
      issues,
    });
  }

  return result.data;
}
