import { CryptoError } from '@sealnote/crypto';

/**
 * Failure categories surfaced by the key-custody services.
 *
 * CONNECTIVITY_FAILURE is transient and must never be read as a denial.
 */
export type E2eeErrorCode =
  | 'AUTHENTICATION_FAILURE'
  | 'INVALID_STATE'
  | 'NOT_AUTHORIZED'
  | 'UNSUPPORTED_OPERATION'
  | 'NOT_FOUND'
  | 'CONNECTIVITY_FAILURE';

export class E2eeError extends Error {
  readonly code: E2eeErrorCode;

  constructor(message: string, code: E2eeErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'E2eeError';
    this.code = code;

    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: unknown) => void;
    };
    if (ErrorWithCapture.captureStackTrace) {
      ErrorWithCapture.captureStackTrace(this, E2eeError);
    }
  }

  static notFound(message: string): E2eeError {
    return new E2eeError(message, 'NOT_FOUND');
  }

  static invalidState(message: string): E2eeError {
    return new E2eeError(message, 'INVALID_STATE');
  }

  static notAuthorized(message: string): E2eeError {
    return new E2eeError(message, 'NOT_AUTHORIZED');
  }

  static connectivity(message: string, cause?: unknown): E2eeError {
    return new E2eeError(message, 'CONNECTIVITY_FAILURE', { cause });
  }

  /**
   * Translate a crypto-layer failure. Authentication and unsupported-KDF failures keep
   * their meaning; every other CryptoError is a state problem (bad stored key sizes).
   * Non-crypto errors are returned unchanged.
   */
  static fromCrypto(error: unknown): unknown {
    if (!(error instanceof CryptoError)) {
      return error;
    }
    switch (error.code) {
      case 'AUTHENTICATION_FAILED':
        return new E2eeError('Decryption failed', 'AUTHENTICATION_FAILURE', { cause: error });
      case 'UNSUPPORTED_OPERATION':
        return new E2eeError(error.message, 'UNSUPPORTED_OPERATION', { cause: error });
      default:
        return new E2eeError(error.message, 'INVALID_STATE', { cause: error });
    }
  }
}

/** Whether an error is a transient transport failure rather than a hard answer. */
export function isConnectivityFailure(error: unknown): boolean {
  return error instanceof E2eeError && error.code === 'CONNECTIVITY_FAILURE';
}

/** Whether an error carries the given code. */
export function hasE2eeCode(error: unknown, code: E2eeErrorCode): boolean {
  return error instanceof E2eeError && error.code === code;
}

/** Message text for log lines. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
