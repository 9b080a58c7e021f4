/**
 * Resolves the secret given to `add`/`update` from --secret, --url, or prompted text.
 */

import { configurationError } from '../errors.js';

export const OTPAUTH_PREFIX = 'otpauth://';

export type SecretInput =
  | { kind: 'secret'; value: string }
  | { kind: 'url'; value: string };

/**
 * Extracts the `secret` query parameter from a URL such as
 * `otpauth://totp/Example:alice?secret=ABC123&issuer=Example`.
 */
export function secretFromUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw configurationError('Malformed URL: could not parse it.', 'INVALID_URL');
  }
  const secret = url.searchParams.get('secret')?.trim();
  if (!secret) {
    throw configurationError('Malformed URL: no "secret" query parameter.', 'INVALID_URL');
  }
  return secret;
}

export function normalizeSecret(raw: string): string {
  const secret = raw.trim();
  if (!secret) {
    throw configurationError('Secret must not be empty.', 'INVALID_SECRET');
  }
  return secret;
}

export function resolveSecret(input: SecretInput): string {
  return input.kind === 'url' ? secretFromUrl(input.value) : normalizeSecret(input.value);
}

/** Text typed at the prompt may be either a bare secret or an otpauth:// URL. */
export function classifyPromptInput(text: string): SecretInput {
  const trimmed = text.trim();
  return trimmed.startsWith(OTPAUTH_PREFIX) ? { kind: 'url', value: trimmed } : { kind: 'secret', value: trimmed };
}
