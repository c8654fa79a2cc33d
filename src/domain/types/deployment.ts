/**
 * Deployment domain types
 *
 * The locally built description of a workload and the snapshot the cluster
 * returns for it. The cluster owns the durable copy once a descriptor is submitted.
 */

export type AnnotationSet = Record<string, string>;

export type LabelSet = Record<string, string>;

export type ImagePullPolicy = 'Always' | 'IfNotPresent' | 'Never';

export interface ResourceDescriptor {
  name: string;
  image: string;
  replicas: number;
  /** Must be a subset of `podLabels` */
  selectorLabels: LabelSet;
  containerPort: number;
  podLabels: LabelSet;
  containerName: string;
  imagePullPolicy: ImagePullPolicy;
}

export interface ResourceSnapshot {
  descriptor: ResourceDescriptor;
  /** Empty when the resource carries no annotations */
  annotations: AnnotationSet;
  resourceVersion?: string;
  generation?: number;
  observedGeneration?: number;
  readyReplicas: number;
}

/**
 * Contract of the remote control plane.
 *
 * Implementations reject with the errors from `src/errors`:
 * create - ConflictError | ValidationError | TransportError
 * read   - NotFoundError | TransportError
 * patch  - NotFoundError | ConflictError | TransportError
 * Any call may also reject with TimeoutError when a per-call timeout applies.
 */
export interface DeploymentApi {
  createResource: (namespace: string, descriptor: ResourceDescriptor) => Promise<void>;
  readResource: (namespace: string, name: string) => Promise<ResourceSnapshot>;
  patchResourceAnnotations: (
    namespace: string,
    name: string,
    annotations: AnnotationSet,
  ) => Promise<void>;
}
