/**
 * CLI option parsing and resolution
 *
 * Turns raw commander values plus the environment configuration into the
 * inputs of the annotate-deployment tool.
 */

import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { WaitStrategySchema, type AppConfig } from '../config/app-config';
import { DEFAULT_ANNOTATIONS } from '../config/defaults';
import type { AnnotationSet, LabelSet, ResourceDescriptor } from '../domain/types';
import { ValidationError } from '../errors';
import { buildDescriptor } from '../lib/descriptor';
import { ifExistsSchema, type IfExistsPolicy, type OnErrorPolicy } from '../tools/annotate-deployment/schema';
import { waitStrategyFromConfig, type WaitStrategy } from '../tools/annotate-deployment/wait';

export type CliOptions = {
  namespace?: string;
  name?: string;
  image?: string;
  replicas?: number;
  port?: number;
  label?: LabelSet;
  annotation?: AnnotationSet;
  wait?: string;
  waitMs?: number;
  continueOnError?: boolean;
  ifExists?: string;
  kubeconfig?: string;
  context?: string;
  logLevel?: string;
};

export interface RunSettings {
  namespace: string;
  descriptor: ResourceDescriptor;
  annotations: AnnotationSet;
  wait: WaitStrategy;
  onError: OnErrorPolicy;
  ifExists: IfExistsPolicy;
  kubeconfig?: string | undefined;
  context?: string | undefined;
  timeoutMs: number;
}

/**
 * Split `key=value` at the first `=`. The value may be empty, the key may not.
 */
export function parseKeyValue(input: string): [string, string] {
  const index = input.indexOf('=');
  if (index === -1) {
    throw new InvalidArgumentError(`Expected key=value, got '${input}'.`);
  }
  const key = input.slice(0, index).trim();
  if (key === '') {
    throw new InvalidArgumentError(`Missing key in '${input}'.`);
  }
  return [key, input.slice(index + 1)];
}

/**
 * Commander collector for repeatable `key=value` options
 */
export function collectKeyValue(input: string, previous: Record<string, string> = {}): Record<string, string> {
  const [key, value] = parseKeyValue(input);
  return { ...previous, [key]: value };
}

export function parseIntegerOption(input: string): number {
  // Number('') and Number('  ') are both 0
  const value = input.trim() === '' ? Number.NaN : Number(input);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`Expected an integer, got '${input}'.`);
  }
  return value;
}

function parseChoice<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: string | undefined, field: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid --${field}: '${value ?? ''}'`, [field], [
      { field, message: result.error.issues.map((issue) => issue.message).join('; ') },
    ]);
  }
  return result.data;
}

/**
 * Merge CLI flags over the environment configuration. Throws ValidationError
 * for an invalid descriptor or option value.
 */
export function resolveRunSettings(options: CliOptions, config: AppConfig): RunSettings {
  const descriptor = buildDescriptor({
    name: options.name,
    image: options.image,
    replicas: options.replicas,
    containerPort: options.port,
    podLabels: options.label,
    selectorLabels: options.label,
  });

  let wait = waitStrategyFromConfig(config.wait);
  if (options.wait !== undefined) {
    const strategy = parseChoice(WaitStrategySchema, options.wait, 'wait');
    wait = waitStrategyFromConfig({ ...config.wait, strategy });
  }
  if (options.waitMs !== undefined) {
    if (options.waitMs < 0) {
      throw new ValidationError(`Invalid --wait-ms: ${options.waitMs}`, ['wait-ms'], [
        { field: 'wait-ms', message: 'must not be negative' },
      ]);
    }
    wait =
      wait.kind === 'fixed'
        ? { ...wait, delayMs: options.waitMs }
        : { ...wait, initialDelayMs: options.waitMs };
  }

  return {
    namespace: options.namespace ?? config.kubernetes.namespace,
    descriptor,
    annotations: options.annotation ?? { ...DEFAULT_ANNOTATIONS },
    wait,
    onError: options.continueOnError === true ? 'continue' : 'abort',
    ifExists: parseChoice(ifExistsSchema, options.ifExists, 'if-exists'),
    kubeconfig: options.kubeconfig ?? config.kubernetes.kubeconfig,
    context: options.context ?? config.kubernetes.context,
    timeoutMs: config.kubernetes.timeout,
  };
}
