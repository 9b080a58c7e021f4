/**
 * CredentialManager — store/retrieve/update/remove per-service secrets over a SecretStore.
 * Has no logic of its own beyond name validation and wrapping backend failures.
 */

import type { SecretStore } from '../secrets/types.js';
import { TotpError, configurationError, errorMessage, keystoreError } from '../errors.js';

export function assertServiceName(service: string | undefined): string {
  const name = service?.trim() ?? '';
  if (!name) {
    throw new TotpError('usage', 'INVALID_SERVICE', 'Service name is required.');
  }
  return name;
}

export class CredentialManager {
  constructor(private readonly secrets: SecretStore) {}

  async store(service: string, secret: string): Promise<void> {
    const name = assertServiceName(service);
    await this.call(`store secret for "${name}"`, () => this.secrets.set(name, secret));
  }

  /** Overwrites whatever is stored; same operation as store. */
  async update(service: string, secret: string): Promise<void> {
    await this.store(service, secret);
  }

  async retrieve(service: string): Promise<string | null> {
    const name = assertServiceName(service);
    const secret = await this.call(`read secret for "${name}"`, () => this.secrets.get(name));
    // An emptied entry counts as absent
    return secret ? secret : null;
  }

  async require(service: string): Promise<string> {
    const secret = await this.retrieve(service);
    if (secret === null) {
      throw configurationError(`Service "${service.trim()}" is not configured.`, 'SERVICE_NOT_FOUND', {
        service: service.trim(),
      });
    }
    return secret;
  }

  async remove(service: string): Promise<boolean> {
    const name = assertServiceName(service);
    return this.call(`delete secret for "${name}"`, () => this.secrets.delete(name));
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw keystoreError(`Failed to ${action} in the ${this.secrets.backend} keystore: ${errorMessage(err)}`, {
        backend: this.secrets.backend,
      });
    }
  }
}
