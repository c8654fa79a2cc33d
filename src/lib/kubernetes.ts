/**
 * Kubernetes Client - Library Export
 *
 * Re-exports Kubernetes client functionality from infrastructure for lib/ imports
 */

export {
  createKubernetesClient,
  createDeploymentApi,
  type KubernetesClient,
  type KubernetesClientConfig,
} from '../infrastructure/kubernetes';
