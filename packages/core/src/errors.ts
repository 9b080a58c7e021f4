/**
 * Error types raised by the core package.
 * The CLI maps `kind` to an exit code; `code` is stable for --json consumers.
 */

export type TotpErrorKind = 'usage' | 'configuration' | 'generation' | 'keystore';

export type TotpErrorCode =
  | 'INVALID_SERVICE'
  | 'INVALID_SECRET'
  | 'INVALID_URL'
  | 'INVALID_CONFIG'
  | 'SERVICE_NOT_FOUND'
  | 'SERVICE_EXISTS'
  | 'GENERATION_FAILED'
  | 'KEYSTORE_FAILED';

export class TotpError extends Error {
  readonly kind: TotpErrorKind;
  readonly code: TotpErrorCode;
  readonly details?: unknown;

  constructor(kind: TotpErrorKind, code: TotpErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'TotpError';
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function configurationError(message: string, code: TotpErrorCode, details?: unknown): TotpError {
  return new TotpError('configuration', code, message, details);
}

export function generationError(message: string, details?: unknown): TotpError {
  return new TotpError('generation', 'GENERATION_FAILED', message, details);
}

export function keystoreError(message: string, details?: unknown): TotpError {
  return new TotpError('keystore', 'KEYSTORE_FAILED', message, details);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
