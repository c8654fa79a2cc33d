/**
 * Kubernetes infrastructure - External K8s client interface
 */

export {
  type KubernetesClient,
  type KubernetesClientConfig,
  type AppsApi,
  createKubernetesClient,
  createDeploymentApi,
  toSnapshot,
  MERGE_PATCH_CONTENT_TYPE,
} from './client';
export { mapKubernetesError, type ApiErrorContext } from './errors';
