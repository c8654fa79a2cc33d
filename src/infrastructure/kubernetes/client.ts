/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Deployment create/read/annotate over @kubernetes/client-node's AppsV1Api.
 * Rejections are mapped to the application's error taxonomy and every call
 * runs under a per-call timeout.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import type { AnnotationSet, DeploymentApi, ResourceDescriptor, ResourceSnapshot } from '../../domain/types';
import { fromDeploymentManifest, toDeploymentManifest } from '../../lib/descriptor';
import { withTimeout } from '../../shared/async';
import { mapKubernetesError, type ApiErrorContext } from './errors';

export const MERGE_PATCH_CONTENT_TYPE = 'application/merge-patch+json';

/**
 * The slice of AppsV1Api this client calls
 */
export interface AppsApi {
  createNamespacedDeployment(
    namespace: string,
    body: k8s.V1Deployment,
  ): Promise<{ body: k8s.V1Deployment }>;
  readNamespacedDeployment(name: string, namespace: string): Promise<{ body: k8s.V1Deployment }>;
  patchNamespacedDeployment(
    name: string,
    namespace: string,
    body: object,
    pretty?: string,
    dryRun?: string,
    fieldManager?: string,
    fieldValidation?: string,
    force?: boolean,
    options?: { headers: { [name: string]: string } },
  ): Promise<{ body: k8s.V1Deployment }>;
}

export interface KubernetesClientConfig {
  /** Path to a kubeconfig file; the default lookup applies when absent */
  kubeconfig?: string | undefined;
  context?: string | undefined;
  /** Per-call timeout in milliseconds */
  timeoutMs?: number | undefined;
}

export type KubernetesClient = DeploymentApi;

/**
 * Convert a Deployment returned by the API server into a snapshot
 */
export function toSnapshot(deployment: k8s.V1Deployment): ResourceSnapshot {
  return {
    descriptor: fromDeploymentManifest(deployment),
    annotations: { ...(deployment.metadata?.annotations ?? {}) },
    resourceVersion: deployment.metadata?.resourceVersion,
    generation: deployment.metadata?.generation,
    observedGeneration: deployment.status?.observedGeneration,
    readyReplicas: deployment.status?.readyReplicas ?? 0,
  };
}

/**
 * Build the deployment API on top of an already configured AppsV1Api
 */
export const createDeploymentApi = (
  appsApi: AppsApi,
  logger: Logger,
  { timeoutMs = DEFAULT_TIMEOUTS.kubernetes }: Pick<KubernetesClientConfig, 'timeoutMs'> = {},
): KubernetesClient => {
  const log = logger.child({ component: 'KubernetesClient' });

  async function call<T>(context: ApiErrorContext, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn, timeoutMs, `${context.operation} deployment ${context.namespace}/${context.name}`);
    } catch (error) {
      const mapped = mapKubernetesError(error, context);
      log.debug({ ...context, errorType: mapped.name, error: mapped.message }, 'Kubernetes API call failed');
      throw mapped;
    }
  }

  return {
    async createResource(namespace: string, descriptor: ResourceDescriptor): Promise<void> {
      const { name } = descriptor;
      log.debug({ namespace, name, image: descriptor.image }, 'Creating deployment');

      await call({ operation: 'create', namespace, name }, () =>
        appsApi.createNamespacedDeployment(namespace, toDeploymentManifest(descriptor)),
      );

      log.info({ namespace, name }, `Deployment '${name}' created in namespace '${namespace}'`);
    },

    async readResource(namespace: string, name: string): Promise<ResourceSnapshot> {
      const { body } = await call({ operation: 'read', namespace, name }, () =>
        appsApi.readNamespacedDeployment(name, namespace),
      );
      return toSnapshot(body);
    },

    async patchResourceAnnotations(
      namespace: string,
      name: string,
      annotations: AnnotationSet,
    ): Promise<void> {
      const patch = { metadata: { annotations: { ...annotations } } };
      log.debug({ namespace, name, keys: Object.keys(annotations) }, 'Patching deployment annotations');

      await call({ operation: 'patch', namespace, name }, () =>
        appsApi.patchNamespacedDeployment(
          name,
          namespace,
          patch,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          { headers: { 'Content-Type': MERGE_PATCH_CONTENT_TYPE } },
        ),
      );

      log.info({ namespace, name }, `Annotations updated for deployment '${name}'`);
    },
  };
};

/**
 * Create a Kubernetes client from kubeconfig (explicit path or default lookup)
 */
export const createKubernetesClient = (
  logger: Logger,
  config: KubernetesClientConfig = {},
): KubernetesClient => {
  const kc = new k8s.KubeConfig();

  if (config.kubeconfig != null) {
    kc.loadFromFile(config.kubeconfig);
  } else {
    kc.loadFromDefault();
  }

  if (config.context != null) {
    kc.setCurrentContext(config.context);
  }

  logger.debug(
    { context: kc.getCurrentContext(), kubeconfig: config.kubeconfig ?? 'default' },
    'Loaded kubeconfig',
  );

  return createDeploymentApi(kc.makeApiClient(k8s.AppsV1Api), logger, { timeoutMs: config.timeoutMs });
};
