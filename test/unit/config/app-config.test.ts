import { describe, it, expect } from '@jest/globals';
import { createAppConfig } from '../../../src/config/app-config';
import { ConfigurationError } from '../../../src/errors';

describe('createAppConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(createAppConfig({})).toEqual({
      server: { nodeEnv: 'development' },
      kubernetes: { namespace: 'default', timeout: 30000 },
      wait: {
        strategy: 'poll',
        fixedDelayMs: 2000,
        maxAttempts: 10,
        initialDelayMs: 500,
        backoffFactor: 2,
        maxDelayMs: 5000,
      },
    });
  });

  it('reads overrides from the environment', () => {
    const config = createAppConfig({
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      K8S_NAMESPACE: 'staging',
      KUBECONFIG: '/etc/kube/config',
      K8S_CONTEXT: 'staging-admin',
      K8S_TIMEOUT: '5000',
      WAIT_STRATEGY: 'fixed',
      WAIT_FIXED_MS: '250',
    });

    expect(config.server).toEqual({ nodeEnv: 'production', logLevel: 'warn' });
    expect(config.kubernetes).toEqual({
      namespace: 'staging',
      kubeconfig: '/etc/kube/config',
      context: 'staging-admin',
      timeout: 5000,
    });
    expect(config.wait.strategy).toBe('fixed');
    expect(config.wait.fixedDelayMs).toBe(250);
  });

  it('leaves the log level unset when LOG_LEVEL is absent', () => {
    expect(createAppConfig({ NODE_ENV: 'production' }).server.logLevel).toBeUndefined();
  });

  it('prefers KUBE_NAMESPACE over K8S_NAMESPACE', () => {
    expect(createAppConfig({ KUBE_NAMESPACE: 'apps', K8S_NAMESPACE: 'other' }).kubernetes.namespace).toBe('apps');
  });

  it('treats empty variables as unset', () => {
    expect(createAppConfig({ K8S_NAMESPACE: '', WAIT_STRATEGY: '' }).kubernetes.namespace).toBe('default');
  });

  it('rejects an unknown wait strategy', () => {
    expect(() => createAppConfig({ WAIT_STRATEGY: 'sometimes' })).toThrow(ConfigurationError);
    try {
      createAppConfig({ WAIT_STRATEGY: 'sometimes' });
    } catch (error) {
      expect(error).toMatchObject({ configKey: 'wait.strategy' });
    }
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => createAppConfig({ K8S_TIMEOUT: 'soon' })).toThrow(/kubernetes\.timeout/);
  });
});
