/**
 * Propagation waits between a write and the read that depends on it
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../../config/app-config';
import type { AnnotationSet, DeploymentApi, ResourceSnapshot } from '../../domain/types';
import { isNotFoundError } from '../../errors';
import { containsAnnotations } from '../../lib/annotations';
import { pollUntil, sleep } from '../../shared/async';

/**
 * `fixed` pauses for a set time and checks nothing. `poll` re-reads the
 * resource with exponential backoff until a predicate holds.
 */
export type WaitStrategy =
  | { kind: 'fixed'; delayMs: number }
  | {
      kind: 'poll';
      maxAttempts: number;
      initialDelayMs: number;
      backoffFactor: number;
      maxDelayMs: number;
    };

export type SnapshotPredicate = (snapshot: ResourceSnapshot) => boolean;

export function waitStrategyFromConfig(wait: AppConfig['wait']): WaitStrategy {
  if (wait.strategy === 'fixed') {
    return { kind: 'fixed', delayMs: wait.fixedDelayMs };
  }
  return {
    kind: 'poll',
    maxAttempts: wait.maxAttempts,
    initialDelayMs: wait.initialDelayMs,
    backoffFactor: wait.backoffFactor,
    maxDelayMs: wait.maxDelayMs,
  };
}

/**
 * The controller has seen the latest spec. A resource without a generation
 * counts as observed.
 */
export const isObserved: SnapshotPredicate = ({ generation, observedGeneration }) =>
  generation === undefined || (observedGeneration !== undefined && observedGeneration >= generation);

export const hasAnnotations =
  (expected: AnnotationSet): SnapshotPredicate =>
  (snapshot) =>
    containsAnnotations(snapshot.annotations, expected);

export interface WaitTarget {
  api: DeploymentApi;
  namespace: string;
  name: string;
  logger: Logger;
}

/**
 * Block until the change is visible. NotFound while polling means "not yet";
 * any other error ends the wait. Rejects with TimeoutError when attempts run out.
 */
export async function waitForPropagation(
  { api, namespace, name, logger }: WaitTarget,
  strategy: WaitStrategy,
  predicate: SnapshotPredicate,
  operation: string,
): Promise<void> {
  if (strategy.kind === 'fixed') {
    logger.debug({ namespace, name, delayMs: strategy.delayMs }, `Waiting ${strategy.delayMs}ms for ${operation}`);
    await sleep(strategy.delayMs);
    return;
  }

  await pollUntil(
    async (attempt) => {
      try {
        const snapshot = await api.readResource(namespace, name);
        const satisfied = predicate(snapshot);
        logger.debug({ namespace, name, attempt, satisfied }, `Polled ${operation}`);
        return satisfied ? snapshot : undefined;
      } catch (error) {
        if (isNotFoundError(error)) {
          logger.debug({ namespace, name, attempt }, `Polled ${operation}: not visible yet`);
          return undefined;
        }
        throw error;
      }
    },
    {
      maxAttempts: strategy.maxAttempts,
      initialDelayMs: strategy.initialDelayMs,
      backoffFactor: strategy.backoffFactor,
      maxDelayMs: strategy.maxDelayMs,
      operation,
    },
  );
}
