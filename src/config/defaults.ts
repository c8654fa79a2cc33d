/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used throughout the application.
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  kubernetes: 30000, // 30 seconds, per API call
  propagation: 2000, // fixed wait between a write and the read that follows it
  pollInitialDelay: 500,
  pollMaxDelay: 5000,
} as const;

export const DEFAULT_POLLING = {
  maxAttempts: 10,
  backoffFactor: 2,
} as const;

export const DEFAULT_KUBERNETES = {
  namespace: 'default',
} as const;

/**
 * The workload created when no overrides are given
 */
export const DEFAULT_DEPLOYMENT = {
  name: 'deploy-nginx',
  image: 'nginx',
  replicas: 1,
  containerPort: 80,
  containerName: 'nginx-sample',
  imagePullPolicy: 'IfNotPresent',
  labels: { app: 'nginx' },
} as const;

/**
 * Annotations applied when none are given
 */
export const DEFAULT_ANNOTATIONS: Readonly<Record<string, string>> = {
  'deployment.kubernetes.io/str': 'nginx',
  'deployment.kubernetes.io/int': '5',
};
