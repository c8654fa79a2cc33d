import { describe, it, expect } from '@jest/globals';
import { InvalidArgumentError } from 'commander';
import { createAppConfig } from '../../../src/config/app-config';
import { ValidationError } from '../../../src/errors';
import {
  collectKeyValue,
  parseIntegerOption,
  parseKeyValue,
  resolveRunSettings,
} from '../../../src/cli/options';

describe('parseKeyValue', () => {
  it('splits at the first equals sign', () => {
    expect(parseKeyValue('a=b=c')).toEqual(['a', 'b=c']);
    expect(parseKeyValue('team=')).toEqual(['team', '']);
  });

  it('rejects input without a separator', () => {
    expect(() => parseKeyValue('team')).toThrow(InvalidArgumentError);
    expect(() => parseKeyValue('team')).toThrow("Expected key=value, got 'team'.");
  });

  it('rejects an empty key', () => {
    expect(() => parseKeyValue('=web')).toThrow("Missing key in '=web'.");
  });
});

describe('collectKeyValue', () => {
  it('accumulates repeated options, later values winning', () => {
    const first = collectKeyValue('team=web');
    const second = collectKeyValue('tier=front', first);
    expect(collectKeyValue('team=api', second)).toEqual({ team: 'api', tier: 'front' });
  });
});

describe('parseIntegerOption', () => {
  it('accepts integers', () => {
    expect(parseIntegerOption('3')).toBe(3);
  });

  it('rejects anything else', () => {
    expect(() => parseIntegerOption('1.5')).toThrow("Expected an integer, got '1.5'.");
    expect(() => parseIntegerOption('three')).toThrow(InvalidArgumentError);
  });

  it('rejects blank input instead of reading it as zero', () => {
    expect(() => parseIntegerOption('')).toThrow("Expected an integer, got ''.");
    expect(() => parseIntegerOption('  ')).toThrow("Expected an integer, got '  '.");
  });
});

describe('resolveRunSettings', () => {
  const config = createAppConfig({});

  it('falls back to the defaults', () => {
    const settings = resolveRunSettings({}, config);

    expect(settings.namespace).toBe('default');
    expect(settings.descriptor.name).toBe('deploy-nginx');
    expect(settings.descriptor.containerName).toBe('nginx-sample');
    expect(settings.annotations).toEqual({
      'deployment.kubernetes.io/str': 'nginx',
      'deployment.kubernetes.io/int': '5',
    });
    expect(settings.wait).toEqual({
      kind: 'poll',
      maxAttempts: 10,
      initialDelayMs: 500,
      backoffFactor: 2,
      maxDelayMs: 5000,
    });
    expect(settings.onError).toBe('abort');
    expect(settings.ifExists).toBe('fail');
    expect(settings.timeoutMs).toBe(30000);
    expect(settings.kubeconfig).toBeUndefined();
  });

  it('applies flags over the configuration', () => {
    const settings = resolveRunSettings(
      {
        namespace: 'staging',
        name: 'web',
        replicas: 3,
        annotation: { team: 'web' },
        wait: 'fixed',
        waitMs: 250,
        continueOnError: true,
        ifExists: 'reuse',
        kubeconfig: '/tmp/kubeconfig',
        context: 'test-context',
      },
      config,
    );

    expect(settings.namespace).toBe('staging');
    expect(settings.descriptor.name).toBe('web');
    expect(settings.descriptor.containerName).toBe('web');
    expect(settings.descriptor.replicas).toBe(3);
    expect(settings.annotations).toEqual({ team: 'web' });
    expect(settings.wait).toEqual({ kind: 'fixed', delayMs: 250 });
    expect(settings.onError).toBe('continue');
    expect(settings.ifExists).toBe('reuse');
    expect(settings.kubeconfig).toBe('/tmp/kubeconfig');
    expect(settings.context).toBe('test-context');
  });

  it('uses --wait-ms as the first poll delay', () => {
    const settings = resolveRunSettings({ waitMs: 100 }, config);
    expect(settings.wait).toEqual({
      kind: 'poll',
      maxAttempts: 10,
      initialDelayMs: 100,
      backoffFactor: 2,
      maxDelayMs: 5000,
    });
  });

  it('applies labels to both the pods and the selector', () => {
    const settings = resolveRunSettings({ label: { app: 'web', tier: 'front' } }, config);
    expect(settings.descriptor.podLabels).toEqual({ app: 'web', tier: 'front' });
    expect(settings.descriptor.selectorLabels).toEqual({ app: 'web', tier: 'front' });
  });

  it('rejects invalid values', () => {
    expect(() => resolveRunSettings({ ifExists: 'replace' }, config)).toThrow("Invalid --if-exists: 'replace'");
    expect(() => resolveRunSettings({ wait: 'sometimes' }, config)).toThrow(ValidationError);
    expect(() => resolveRunSettings({ waitMs: -1 }, config)).toThrow('Invalid --wait-ms: -1');
    expect(() => resolveRunSettings({ replicas: 0 }, config)).toThrow(ValidationError);
  });
});
