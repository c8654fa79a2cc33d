/**
 * Annotate Deployment Tool
 *
 * Creates a Deployment, waits for it to become visible, merges annotations
 * into its metadata with a merge-patch, waits again and reports the result.
 * Each step is recorded; under `onError: 'abort'` the first failure skips the
 * remaining steps, under `'continue'` every step is attempted except a wait
 * whose write failed.
 *
 * @example
 * ```typescript
 * const report = await annotateDeployment(
 *   { descriptor: buildDescriptor(), annotations: { team: 'web' } },
 *   { api: createKubernetesClient(logger), logger, wait: { kind: 'fixed', delayMs: 2000 } },
 * );
 *
 * if (!report.ok) {
 *   process.exitCode = 1;
 * }
 * ```
 */

import type { Logger } from 'pino';
import {
  Failure,
  Success,
  isOk,
  type AnnotationSet,
  type DeploymentApi,
  type ResourceDescriptor,
  type Result,
} from '../../domain/types';
import {
  ValidationError,
  isConflictError,
  normalizeError,
  serializeError,
  type ApplicationError,
} from '../../errors';
import { mergeAnnotations, changedAnnotationKeys } from '../../lib/annotations';
import { validateDescriptor } from '../../lib/descriptor';
import { createTimer } from '../../lib/logger';
import { annotateDeploymentSchema, type IfExistsPolicy } from './schema';
import { hasAnnotations, isObserved, waitForPropagation, type WaitStrategy } from './wait';

export type StepName =
  | 'create'
  | 'wait-created'
  | 'read-before'
  | 'annotate'
  | 'wait-annotated'
  | 'read-after';

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export interface StepResult {
  step: StepName;
  status: StepStatus;
  durationMs: number;
  error?: ApplicationError;
}

export interface AnnotateDeploymentReport {
  /** True only when every step succeeded */
  ok: boolean;
  namespace: string;
  name: string;
  steps: StepResult[];
  annotationsBefore?: AnnotationSet;
  merged?: AnnotationSet;
  annotationsAfter?: AnnotationSet;
}

export interface AnnotateDeploymentParams {
  namespace?: string;
  descriptor: ResourceDescriptor;
  annotations: AnnotationSet;
  onError?: 'abort' | 'continue';
  ifExists?: IfExistsPolicy;
}

/** A failed step carries its error; a skipped one carries none */
type StepOutcome<T> = Result<T, ApplicationError | undefined>;

export interface AnnotateDeploymentContext {
  api: DeploymentApi;
  logger: Logger;
  wait: WaitStrategy;
}

/**
 * Create the deployment; under `ifExists: 'reuse'` an existing one is accepted
 */
export async function createDeployment(
  api: DeploymentApi,
  namespace: string,
  descriptor: ResourceDescriptor,
  ifExists: IfExistsPolicy,
  logger: Logger,
): Promise<void> {
  try {
    await api.createResource(namespace, descriptor);
  } catch (error) {
    if (ifExists === 'reuse' && isConflictError(error)) {
      logger.info(
        { namespace, name: descriptor.name },
        `Deployment '${descriptor.name}' already exists, reusing it`,
      );
      return;
    }
    throw error;
  }
}

/**
 * Read the current annotations, merge `newAnnotations` over them and send
 * the result as a merge-patch touching nothing but metadata.annotations.
 */
export async function annotateResource(
  api: DeploymentApi,
  namespace: string,
  name: string,
  newAnnotations: AnnotationSet,
  logger: Logger,
): Promise<AnnotationSet> {
  const current = await api.readResource(namespace, name);
  const merged = mergeAnnotations(current.annotations, newAnnotations);

  logger.debug(
    { namespace, name, changed: changedAnnotationKeys(current.annotations, merged) },
    'Merged annotations',
  );

  await api.patchResourceAnnotations(namespace, name, merged);
  return merged;
}

/**
 * Run create → wait → read → annotate → wait → read against `context.api`.
 * Resolves with a report for any outcome of the remote calls; rejects with
 * ValidationError only when the parameters themselves are invalid.
 */
export async function annotateDeployment(
  params: AnnotateDeploymentParams,
  context: AnnotateDeploymentContext,
): Promise<AnnotateDeploymentReport> {
  const parsed = annotateDeploymentSchema.safeParse({
    namespace: params.namespace,
    annotations: params.annotations,
    onError: params.onError,
    ifExists: params.ifExists,
  });
  if (!parsed.success) {
    const violations = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid annotate-deployment parameters: ${violations.map((v) => `${v.field}: ${v.message}`).join('; ')}`,
      violations.map((v) => v.field),
      violations,
    );
  }

  const { namespace, annotations, onError, ifExists } = parsed.data;
  const descriptor = validateDescriptor(params.descriptor);
  const { name } = descriptor;
  const { api, wait } = context;
  const logger = context.logger.child({ tool: 'annotate-deployment', namespace, name });

  const report: AnnotateDeploymentReport = { ok: false, namespace, name, steps: [] };
  let aborted = false;

  async function runStep<T>(
    step: StepName,
    fn: () => Promise<T>,
    input?: StepOutcome<unknown>,
  ): Promise<StepOutcome<T>> {
    if (aborted || (input !== undefined && !isOk(input))) {
      report.steps.push({ step, status: 'skipped', durationMs: 0 });
      logger.debug({ step }, `Skipping ${step} after an earlier failure`);
      return Failure<T, ApplicationError | undefined>(undefined);
    }

    const timer = createTimer(logger, step);
    try {
      const value = await fn();
      report.steps.push({ step, status: 'succeeded', durationMs: timer.end() });
      return Success<T, ApplicationError | undefined>(value);
    } catch (error) {
      const normalized = normalizeError(error);
      report.steps.push({
        step,
        status: 'failed',
        durationMs: timer.error(normalized, { error: serializeError(normalized) }),
        error: normalized,
      });
      if (onError === 'abort') {
        aborted = true;
      }
      return Failure<T, ApplicationError | undefined>(normalized);
    }
  }

  const target = { api, namespace, name, logger };

  await runStep('create', () => createDeployment(api, namespace, descriptor, ifExists, logger));

  await runStep('wait-created', () => waitForPropagation(target, wait, isObserved, 'deployment creation'));

  const before = await runStep('read-before', () => api.readResource(namespace, name));
  if (isOk(before)) {
    report.annotationsBefore = before.value.annotations;
    logger.info({ annotations: before.value.annotations }, 'Before annotation');
  }

  const merged = await runStep('annotate', () => annotateResource(api, namespace, name, annotations, logger));
  if (isOk(merged)) {
    report.merged = merged.value;
  }

  // Nothing to wait for when the patch was never applied
  const expected = report.merged ?? annotations;
  await runStep(
    'wait-annotated',
    () => waitForPropagation(target, wait, hasAnnotations(expected), 'annotation update'),
    merged,
  );

  const after = await runStep('read-after', () => api.readResource(namespace, name));
  if (isOk(after)) {
    report.annotationsAfter = after.value.annotations;
    logger.info({ annotations: after.value.annotations }, 'After annotation');
  }

  report.ok = report.steps.every((step) => step.status === 'succeeded');

  const failed = report.steps.filter((step) => step.status === 'failed').map((step) => step.step);
  if (report.ok) {
    logger.info('Deployment annotated');
  } else {
    logger.warn({ failed }, 'Deployment annotation did not complete');
  }

  return report;
}
