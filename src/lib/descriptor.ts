/**
 * Deployment descriptor construction
 *
 * Builds the local description of the workload, checks it before it is sent
 * anywhere, and converts it to and from the apps/v1 Deployment manifest.
 */

import type { V1Container, V1Deployment } from '@kubernetes/client-node';
import { z } from 'zod';
import { DEFAULT_DEPLOYMENT } from '../config/defaults';
import type { ImagePullPolicy, LabelSet, ResourceDescriptor } from '../domain/types';
import { ValidationError } from '../errors';

const RFC1123_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const PULL_POLICIES = ['Always', 'IfNotPresent', 'Never'] as const;

const DnsLabelSchema = z
  .string()
  .max(63, 'must be at most 63 characters')
  .regex(RFC1123_LABEL, 'must be a lowercase RFC 1123 label');

const LabelSetSchema = z
  .record(z.string())
  .refine((labels) => Object.keys(labels).length > 0, 'must not be empty');

export const ResourceDescriptorSchema = z
  .object({
    name: DnsLabelSchema,
    image: z.string().trim().min(1, 'must not be empty'),
    replicas: z.number().int('must be an integer').positive('must be a positive integer'),
    selectorLabels: LabelSetSchema,
    containerPort: z
      .number()
      .int('must be an integer')
      .min(1, 'must be between 1 and 65535')
      .max(65535, 'must be between 1 and 65535'),
    podLabels: LabelSetSchema,
    containerName: DnsLabelSchema,
    imagePullPolicy: z.enum(PULL_POLICIES),
  })
  .superRefine((descriptor, ctx) => {
    for (const [key, value] of Object.entries(descriptor.selectorLabels)) {
      if (descriptor.podLabels[key] !== value) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['selectorLabels', key],
          message: `${key}=${value} is not among the pod labels`,
        });
      }
    }
  });

export type DescriptorInput = Partial<ResourceDescriptor>;

/**
 * Check a descriptor against the rules the API server would otherwise enforce
 * after the fact. Throws ValidationError carrying every violation.
 */
export function validateDescriptor(descriptor: ResourceDescriptor): ResourceDescriptor {
  const result = ResourceDescriptorSchema.safeParse(descriptor);
  if (result.success) {
    return descriptor;
  }

  const violations = result.error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
  throw new ValidationError(
    `Invalid deployment descriptor: ${violations.map((v) => `${v.field}: ${v.message}`).join('; ')}`,
    violations.map((v) => v.field),
    violations,
    { name: descriptor.name },
  );
}

/**
 * Build a descriptor from overrides on top of the nginx defaults.
 *
 * A custom name doubles as the container name unless one is given, and each
 * label map defaults to the other so selector and template stay in step.
 */
export function buildDescriptor(input: DescriptorInput = {}): ResourceDescriptor {
  const defaultLabels: LabelSet = { ...DEFAULT_DEPLOYMENT.labels };
  const podLabels = input.podLabels ?? input.selectorLabels ?? defaultLabels;
  const selectorLabels = input.selectorLabels ?? input.podLabels ?? defaultLabels;

  return validateDescriptor({
    name: input.name ?? DEFAULT_DEPLOYMENT.name,
    image: input.image ?? DEFAULT_DEPLOYMENT.image,
    replicas: input.replicas ?? DEFAULT_DEPLOYMENT.replicas,
    selectorLabels: { ...selectorLabels },
    containerPort: input.containerPort ?? DEFAULT_DEPLOYMENT.containerPort,
    podLabels: { ...podLabels },
    containerName: input.containerName ?? input.name ?? DEFAULT_DEPLOYMENT.containerName,
    imagePullPolicy: input.imagePullPolicy ?? DEFAULT_DEPLOYMENT.imagePullPolicy,
  });
}

/**
 * Render the apps/v1 Deployment body for a descriptor
 */
export function toDeploymentManifest(descriptor: ResourceDescriptor): V1Deployment {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: descriptor.name },
    spec: {
      replicas: descriptor.replicas,
      selector: { matchLabels: { ...descriptor.selectorLabels } },
      template: {
        metadata: { labels: { ...descriptor.podLabels } },
        spec: {
          containers: [
            {
              name: descriptor.containerName,
              image: descriptor.image,
              imagePullPolicy: descriptor.imagePullPolicy,
              ports: [{ containerPort: descriptor.containerPort }],
            },
          ],
        },
      },
    },
  };
}

function isPullPolicy(value: string | undefined): value is ImagePullPolicy {
  return PULL_POLICIES.some((policy) => policy === value);
}

/**
 * Read a descriptor back from a Deployment returned by the cluster. Only the
 * first container is considered; `containerPort` is 0 when it exposes none.
 */
export function fromDeploymentManifest(deployment: V1Deployment): ResourceDescriptor {
  const container: V1Container | undefined = deployment.spec?.template.spec?.containers[0];
  const pullPolicy = container?.imagePullPolicy;

  return {
    name: deployment.metadata?.name ?? '',
    image: container?.image ?? '',
    replicas: deployment.spec?.replicas ?? 1,
    selectorLabels: { ...(deployment.spec?.selector.matchLabels ?? {}) },
    containerPort: container?.ports?.[0]?.containerPort ?? 0,
    podLabels: { ...(deployment.spec?.template.metadata?.labels ?? {}) },
    containerName: container?.name ?? '',
    imagePullPolicy: isPullPolicy(pullPolicy) ? pullPolicy : DEFAULT_DEPLOYMENT.imagePullPolicy,
  };
}
