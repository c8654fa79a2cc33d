/**
 * Kubernetes API error mapping
 *
 * The client library rejects with an HttpError carrying `statusCode` and the
 * server's Status object as `body`; connection failures arrive as plain errors.
 */

import {
  ApplicationError,
  ConflictError,
  NotFoundError,
  TransportError,
  ValidationError,
  isApplicationError,
} from '../../errors';

// Type guard for HTTP errors with statusCode
interface HttpError extends Error {
  statusCode?: number;
  body?: unknown;
}

function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error && 'statusCode' in error;
}

function statusMessage(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    return typeof message === 'string' ? message : undefined;
  }
  return undefined;
}

export interface ApiErrorContext {
  operation: 'create' | 'read' | 'patch';
  namespace: string;
  name: string;
}

/**
 * Translate a rejected API call into the application's error taxonomy
 */
export function mapKubernetesError(error: unknown, { operation, namespace, name }: ApiErrorContext): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }

  const resource = `deployment ${namespace}/${name}`;

  if (!isHttpError(error) || typeof error.statusCode !== 'number') {
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(
      `Failed to ${operation} ${resource}: ${message}`,
      undefined,
      operation,
      error instanceof Error ? error : undefined,
      { namespace, name },
    );
  }

  const { statusCode } = error;
  const detail = statusMessage(error.body) ?? error.message;
  const context = { namespace, name, statusCode };

  switch (statusCode) {
    case 404:
      return new NotFoundError(`${resource} not found: ${detail}`, 'Deployment', name, context);
    case 409:
      return new ConflictError(
        operation === 'create'
          ? `${resource} already exists: ${detail}`
          : `Conflicting update to ${resource}: ${detail}`,
        'Deployment',
        name,
        error,
        context,
      );
    case 400:
    case 422:
      return new ValidationError(`API server rejected ${resource}: ${detail}`, undefined, undefined, context);
    default:
      return new TransportError(
        `Failed to ${operation} ${resource} (HTTP ${statusCode}): ${detail}`,
        statusCode,
        operation,
        error,
        context,
      );
  }
}
