import { generationError } from '../errors.js';
import { TOTP_DIGITS } from './types.js';

const CODE_PATTERN = new RegExp(`^\\d{${TOTP_DIGITS}}$`);

/** Validate generator output: exactly one line holding a six-digit code. */
export function parseCode(output: string): string {
  const code = output.trim();
  if (!CODE_PATTERN.test(code)) {
    throw generationError(`Generator returned malformed output; expected ${TOTP_DIGITS} digits.`, {
      output: code.slice(0, 64),
    });
  }
  return code;
}
