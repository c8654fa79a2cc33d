/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isOk, type Result } from './result';

export type {
  AnnotationSet,
  LabelSet,
  ImagePullPolicy,
  ResourceDescriptor,
  ResourceSnapshot,
  DeploymentApi,
} from './deployment';
