/**
 * Typed errors for the risk engine, the callback handler and group sync.
 *
 * Errors are returned as typed values inside structured results rather than
 * thrown across component boundaries. Directory and signal-source exceptions
 * are caught where the call is made and converted into one of these.
 */

/** A remediation step an operator can apply, e.g. WAIT_AND_RETRY. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in results and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "DIRECTORY.ACTION_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Principal the error concerns, if any. */
  principalId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Build a typed error; not retryable and without fixes unless given. */
export function createTypedError(params: {
  code: string;
  message: string;
  principalId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    principalId: params.principalId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown, fallback = 'Unknown error'): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string' && err.length > 0) return err;
  return fallback;
}

// --- Factories, one per failure kind ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
  });
}

export function callbackPayloadError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.CALLBACK_PAYLOAD',
    message,
    details,
  });
}

export function lifecycleEventError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.LIFECYCLE_EVENT',
    message,
    details,
  });
}

export function callbackAuthError(headerName: string): TypedError {
  return createTypedError({
    code: 'AUTH.CALLBACK_SECRET',
    message: `Shared secret header "${headerName}" is missing or does not match`,
    suggestedFixes: [
      { type: 'CHECK_SHARED_SECRET', params: { header: headerName }, description: 'Configure the approval channel with the callback shared secret.' },
    ],
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
  });
}

export function principalNotFoundError(principalId: string): TypedError {
  return createTypedError({
    code: 'PRINCIPAL.NOT_FOUND',
    message: `Principal not found: ${principalId}`,
    principalId,
  });
}

export function sourceUnavailableError(source: string, reason: string): TypedError {
  return createTypedError({
    code: 'SOURCE.UNAVAILABLE',
    message: `Signal source ${source} unavailable: ${reason}`,
    retryable: true,
    details: { source },
  });
}

export function directoryLookupError(principalId: string, message: string): TypedError {
  return createTypedError({
    code: 'DIRECTORY.LOOKUP_FAILED',
    message: `Directory lookup failed for ${principalId}: ${message}`,
    principalId,
    retryable: true,
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } }],
  });
}

export function directoryActionError(
  operation: string,
  message: string,
  details?: Record<string, unknown>,
  principalId?: string,
): TypedError {
  return createTypedError({
    code: 'DIRECTORY.ACTION_FAILED',
    message: `${operation} failed: ${message}`,
    principalId,
    retryable: true,
    details: { operation, ...details },
  });
}

export function notificationError(message: string): TypedError {
  return createTypedError({
    code: 'NOTIFICATION.FAILED',
    message,
    retryable: true,
  });
}

export function mitigationInProgressError(principalId: string): TypedError {
  return createTypedError({
    code: 'MITIGATION.IN_PROGRESS',
    message: `An evaluation for ${principalId} is already in progress`,
    principalId,
    retryable: true,
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 1000 } }],
  });
}

export function groupSyncError(operation: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'GROUP.SYNC_FAILED',
    message: `${operation} failed: ${message}`,
    retryable: true,
    details: { operation, ...details },
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
  });
}

/**
 * Mask a token or shared secret for logs and error text. The last 4
 * characters stay visible when the secret has at least 8.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with its
 * masked form. Used before channel or directory error text reaches logs.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of secret characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Map a typed error onto an HTTP status code. */
export function httpStatusFor(error: TypedError): number {
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'MITIGATION.IN_PROGRESS') return 409;
  if (error.code === 'SOURCE.UNAVAILABLE') return 503;
  return 500;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
