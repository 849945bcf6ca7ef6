/**
 * TrustBootstrapError: thrown by every bootstrap and fetch step that fails.
 *
 * There is no partial success: a call either yields a verified bundle / fetch
 * result or throws this error. error_type provides machine-readable
 * classification for audit logs.
 *
 * INTEGRITY_MISMATCH is fatal. The response body that failed verification is
 * never attached to the error or returned to the caller.
 */

export type TrustBootstrapErrorType =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'BAD_STATUS'
  | 'INTEGRITY_MISMATCH'
  | 'TOKEN_RESOLUTION_FAILED'
  | 'HARDWARE_FETCH_FAILED';

export class TrustBootstrapError extends Error {
  public readonly error_type: TrustBootstrapErrorType;

  constructor(error_type: TrustBootstrapErrorType, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TrustBootstrapError';
    this.error_type = error_type;
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
