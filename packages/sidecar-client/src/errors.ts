/**
 * Error taxonomy surfaced by the sidecar client.
 *
 * Every failure reaches callers as exactly one of these classes, discriminated
 * by `kind`. They travel inside neverthrow `Result` values and are not thrown.
 */

export const ErrorCodes = {
  DOES_NOT_EXIST: 'ERR_DOES_NOT_EXIST',
  MALFORMED_RESPONSE: 'ERR_MALFORMED_RESPONSE',
  OPERATION_CANCELLED: 'ERR_OPERATION_CANCELLED',
  REQUEST_FAILED: 'ERR_REQUEST_FAILED',
  SIDECAR_DOES_NOT_EXIST: 'ERR_SIDECAR_DOES_NOT_EXIST',
  UNKNOWN: 'ERR_UNKNOWN',
} as const;

export const ErrorMessages = {
  ERROR_BODY_NOT_JSON: 'The error body returned by the sidecar is not valid JSON.',
  NO_MEANINGFUL_MESSAGE: 'No meaningful error message was returned by the sidecar.',
  RESOURCE_NOT_CONFIGURED: 'The requested sidecar resource is not configured.',
  SIDECAR_NOT_PRESENT:
    'The sidecar is not present. See https://docs.dapr.io/operations/troubleshooting/common_issues/ to debug the sidecar.',
} as const;

/**
 * A required argument was null, undefined or empty. Raised before any network activity.
 */
export class InvalidArgumentError extends Error {
  readonly kind = 'invalid-argument' as const;

  constructor(
    public readonly argumentName: string,
    message = `${argumentName} must be a non-empty string`
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export type NormalizedErrorKind = 'sidecar-error' | 'sidecar-not-present';

/**
 * Normalized form of a transport fault or a non-success sidecar response.
 *
 * `kind` is `'sidecar-not-present'` only when the sidecar refused the connection,
 * which callers may treat as "feature unavailable".
 */
export class NormalizedError extends Error {
  constructor(
    public readonly kind: NormalizedErrorKind,
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = kind === 'sidecar-not-present' ? 'SidecarNotPresentError' : 'NormalizedError';
  }

  override toString(): string {
    const base = `Status Code: ${this.statusCode}; Error Code: ${this.errorCode}; Message: ${this.message}`;
    if (this.cause === undefined) {
      return base;
    }
    const cause = this.cause instanceof Error ? this.cause.toString() : String(this.cause);
    return `${base}; Cause: ${cause}`;
  }
}

/**
 * The caller's abort signal fired while the call was outstanding.
 */
export class OperationCancelledError extends Error {
  readonly kind = 'cancelled' as const;

  constructor(message = 'The operation was cancelled', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'OperationCancelledError';
  }
}

export type SidecarClientError = InvalidArgumentError | NormalizedError | OperationCancelledError;

export function sidecarNotPresent(cause: unknown): NormalizedError {
  return new NormalizedError(
    'sidecar-not-present',
    503,
    ErrorCodes.SIDECAR_DOES_NOT_EXIST,
    ErrorMessages.SIDECAR_NOT_PRESENT,
    cause
  );
}

export function requestFailed(message: string, cause?: unknown): NormalizedError {
  return new NormalizedError('sidecar-error', 500, ErrorCodes.REQUEST_FAILED, message, cause);
}

export function isSidecarNotPresent(error: SidecarClientError): boolean {
  return error.kind === 'sidecar-not-present';
}
