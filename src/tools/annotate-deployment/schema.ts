/**
 * Schema definition for annotate-deployment tool
 */

import { z } from 'zod';
import { DEFAULT_KUBERNETES } from '../../config/defaults';

export const onErrorSchema = z
  .enum(['abort', 'continue'])
  .default('abort')
  .describe('Stop at the first failed step, or attempt every step regardless');

export const ifExistsSchema = z
  .enum(['fail', 'reuse'])
  .default('fail')
  .describe('Treat an already existing deployment as a failed create, or annotate it anyway');

export const annotationSetSchema = z
  .record(z.string().min(1, 'annotation keys must not be empty'), z.string())
  .describe('Annotations merged into the deployment metadata');

export const annotateDeploymentSchema = z.object({
  namespace: z.string().min(1).default(DEFAULT_KUBERNETES.namespace).describe('Kubernetes namespace'),
  annotations: annotationSetSchema,
  onError: onErrorSchema,
  ifExists: ifExistsSchema,
});

export type AnnotateDeploymentOptions = z.infer<typeof annotateDeploymentSchema>;

export type OnErrorPolicy = AnnotateDeploymentOptions['onError'];

export type IfExistsPolicy = AnnotateDeploymentOptions['ifExists'];
