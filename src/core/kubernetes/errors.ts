/**
 * Kubernetes Error Handling Utilities
 *
 * Classifies errors thrown by @kubernetes/client-node and translates them into
 * the operator's error taxonomy. Supports the 1.x `ApiException` shape
 * (`code`, `body`) as well as the older `statusCode` / `response.statusCode`
 * shapes that some middlewares and fakes still produce.
 */

import {
  AlreadyExistsError,
  RecordNotFoundError,
  StoreUnavailableError,
  WriteConflictError,
} from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

export interface KubernetesApiError {
  code?: number;
  statusCode?: number;
  response?: {
    statusCode?: number;
  };
  body?:
    | string
    | {
        code?: number;
        message?: string;
        reason?: string;
      };
  message?: string;
  name?: string;
}

function isApiErrorShape(error: unknown): error is KubernetesApiError {
  return typeof error === 'object' && error !== null;
}

/**
 * The status body of an ApiException arrives either parsed or as JSON text.
 */
function getStatusBody(error: KubernetesApiError): { code?: number; message?: string; reason?: string } {
  const { body } = error;
  if (typeof body === 'string') {
    try {
      const parsed: unknown = JSON.parse(body);
      if (typeof parsed === 'object' && parsed !== null) {
        return {
          ...('code' in parsed && typeof parsed.code === 'number' && { code: parsed.code }),
          ...('message' in parsed && typeof parsed.message === 'string' && { message: parsed.message }),
          ...('reason' in parsed && typeof parsed.reason === 'string' && { reason: parsed.reason }),
        };
      }
    } catch {
      return { message: body };
    }
    return {};
  }
  return body ?? {};
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @example
 * ```typescript
 * try {
 *   await customObjects.getNamespacedCustomObject(request);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // gone
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isApiErrorShape(error)) {
    return undefined;
  }

  if (typeof error.code === 'number') {
    return error.code;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  if (typeof error.response?.statusCode === 'number') {
    return error.response.statusCode;
  }

  const statusBody = getStatusBody(error);
  if (typeof statusBody.code === 'number') {
    return statusBody.code;
  }

  logger.trace('Could not extract status code from error', {
    errorType: typeof error,
    errorKeys: Object.keys(error),
  });

  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * 409: either the object already exists (create) or its resourceVersion is
 * stale (update).
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];

export function isRetryableError(error: unknown): boolean {
  const statusCode = getErrorStatusCode(error);
  if (statusCode !== undefined && RETRYABLE_STATUS_CODES.includes(statusCode)) {
    return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('econnrefused') ||
      message.includes('enotfound') ||
      message.includes('etimedout') ||
      message.includes('network error') ||
      message.includes('socket hang up') ||
      message.includes('connection reset')
    ) {
      return true;
    }

    if (error instanceof TypeError && message.includes('fetch')) {
      return true;
    }

    if (error.name === 'AbortError') {
      return true;
    }
  }

  return false;
}

export function getErrorReason(error: unknown): string | undefined {
  return isApiErrorShape(error) ? getStatusBody(error).reason : undefined;
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * @example
 * ```typescript
 * formatKubernetesError({ code: 404, body: { reason: 'NotFound', message: 'gone' } });
 * // "Kubernetes API error (404): NotFound: gone"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  if (!isApiErrorShape(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const statusBody = getStatusBody(error);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (statusBody.reason) {
    parts.push(statusBody.reason);
  }

  if (statusBody.message) {
    parts.push(statusBody.message);
  } else if (error.message) {
    parts.push(error.message);
  }

  return parts.join(': ');
}

export type StoreOperation = 'get' | 'list' | 'create' | 'update' | 'updateStatus' | 'delete';

/**
 * Translate a client error into the operator error taxonomy.
 *
 * A 409 means AlreadyExists for `create` and a stale resourceVersion for
 * every other write.
 */
export function toStoreError(error: unknown, operation: StoreOperation, resourceId: string): Error {
  const statusCode = getErrorStatusCode(error);

  if (statusCode === 404) {
    return new RecordNotFoundError(resourceId, { cause: error });
  }

  if (statusCode === 409) {
    return operation === 'create'
      ? new AlreadyExistsError(resourceId, { cause: error })
      : new WriteConflictError(resourceId, { cause: error });
  }

  return new StoreUnavailableError(operation, resourceId, formatKubernetesError(error), {
    cause: error,
  });
}
