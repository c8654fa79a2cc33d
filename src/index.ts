/**
 * Deployment Annotator - public API
 */

export * from './domain/types';
export * from './errors';
export { createAppConfig, type AppConfig, type WaitStrategyName } from './config';
export { createLogger, createTimer, defaultLogLevel, type Logger, type Timer } from './lib/logger';
export { mergeAnnotations, containsAnnotations, changedAnnotationKeys } from './lib/annotations';
export {
  buildDescriptor,
  validateDescriptor,
  toDeploymentManifest,
  fromDeploymentManifest,
  ResourceDescriptorSchema,
  type DescriptorInput,
} from './lib/descriptor';
export {
  createKubernetesClient,
  createDeploymentApi,
  mapKubernetesError,
  MERGE_PATCH_CONTENT_TYPE,
  type AppsApi,
  type KubernetesClient,
  type KubernetesClientConfig,
} from './infrastructure/kubernetes';
export * from './tools/annotate-deployment';
