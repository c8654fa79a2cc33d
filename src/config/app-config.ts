/**
 * Unified Application Configuration
 *
 * Environment variables validated with Zod, defaults from `./defaults`.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_KUBERNETES, DEFAULT_POLLING, DEFAULT_TIMEOUTS } from './defaults';

// Zod validation schemas
const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('development');
// Unset leaves the choice to createLogger
const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional();
export const WaitStrategySchema = z.enum(['fixed', 'poll']).default('poll');

// Main configuration schema
const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
  }),
  kubernetes: z.object({
    namespace: z.string().min(1).default(DEFAULT_KUBERNETES.namespace),
    kubeconfig: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
    timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.kubernetes),
  }),
  wait: z.object({
    strategy: WaitStrategySchema,
    fixedDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.propagation),
    maxAttempts: z.coerce.number().int().positive().default(DEFAULT_POLLING.maxAttempts),
    initialDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.pollInitialDelay),
    backoffFactor: z.coerce.number().min(1).default(DEFAULT_POLLING.backoffFactor),
    maxDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.pollMaxDelay),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type WaitStrategyName = z.infer<typeof WaitStrategySchema>;

type Env = Record<string, string | undefined>;

/**
 * Unset and empty variables both fall back to the default
 */
function getEnvValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function createAppConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      logLevel: getEnvValue(env, 'LOG_LEVEL'),
    },
    kubernetes: {
      namespace: getEnvValue(env, 'KUBE_NAMESPACE') ?? getEnvValue(env, 'K8S_NAMESPACE'),
      kubeconfig: getEnvValue(env, 'KUBECONFIG'),
      context: getEnvValue(env, 'K8S_CONTEXT'),
      timeout: getEnvValue(env, 'K8S_TIMEOUT'),
    },
    wait: {
      strategy: getEnvValue(env, 'WAIT_STRATEGY'),
      fixedDelayMs: getEnvValue(env, 'WAIT_FIXED_MS'),
      maxAttempts: getEnvValue(env, 'WAIT_MAX_ATTEMPTS'),
      initialDelayMs: getEnvValue(env, 'WAIT_INITIAL_DELAY_MS'),
      backoffFactor: getEnvValue(env, 'WAIT_BACKOFF_FACTOR'),
      maxDelayMs: getEnvValue(env, 'WAIT_MAX_DELAY_MS'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Configuration validation failed: ${result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
      issue?.path.join('.'),
      undefined,
      undefined,
      { issues: result.error.issues.length },
    );
  }

  return result.data;
}
