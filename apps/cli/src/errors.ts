import { TotpError } from '@totp-keyring/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_CONFIGURATION = 3;

export type CliErrorCode = 'INVALID_ARGS' | 'INTERNAL_ERROR';

/** Argument problems detected by the CLI itself, before core is reached. */
export class CliError extends Error {
  readonly kind = 'usage';
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, details?: unknown): CliError {
  return new CliError('INVALID_ARGS', message, details);
}

export function errorCode(error: unknown): string {
  if (error instanceof CliError || error instanceof TotpError) return error.code;
  return 'INTERNAL_ERROR';
}

export function errorDetails(error: unknown): unknown {
  if (error instanceof CliError || error instanceof TotpError) return error.details;
  return undefined;
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) return EXIT_CODE_USAGE;
  if (error instanceof TotpError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'configuration') return EXIT_CODE_CONFIGURATION;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
