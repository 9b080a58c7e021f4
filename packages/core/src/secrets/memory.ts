/**
 * MemorySecretStore — keeps secrets in a Map for the lifetime of the process.
 */

import type { SecretStore } from './types.js';

export class MemorySecretStore implements SecretStore {
  readonly backend = 'memory';
  private readonly secrets = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    for (const [service, secret] of Object.entries(initial ?? {})) {
      this.secrets.set(service, secret);
    }
  }

  async set(service: string, secret: string): Promise<void> {
    this.secrets.set(service, secret);
  }

  async get(service: string): Promise<string | null> {
    return this.secrets.get(service) ?? null;
  }

  async delete(service: string): Promise<boolean> {
    return this.secrets.delete(service);
  }
}
