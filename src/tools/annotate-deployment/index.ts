/**
 * Annotate Deployment Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { annotateDeployment, annotateResource, createDeployment } from './tool';
export type {
  AnnotateDeploymentContext,
  AnnotateDeploymentParams,
  AnnotateDeploymentReport,
  StepName,
  StepResult,
  StepStatus,
} from './tool';
export { annotateDeploymentSchema, type AnnotateDeploymentOptions, type OnErrorPolicy, type IfExistsPolicy } from './schema';
export {
  waitForPropagation,
  waitStrategyFromConfig,
  isObserved,
  hasAnnotations,
  type WaitStrategy,
  type SnapshotPredicate,
} from './wait';
