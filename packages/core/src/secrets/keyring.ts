/**
 * KeyringSecretStore — OS credential store (Keychain, Secret Service, Windows Credential Manager).
 * Each service is one entry whose keystore service and account are both the service name.
 */

import { Entry } from '@napi-rs/keyring';
import type { SecretStore } from './types.js';

export class KeyringSecretStore implements SecretStore {
  readonly backend = 'keyring';

  private entry(service: string): Entry {
    return new Entry(service, service);
  }

  async set(service: string, secret: string): Promise<void> {
    this.entry(service).setPassword(secret);
  }

  async get(service: string): Promise<string | null> {
    return this.entry(service).getPassword() ?? null;
  }

  async delete(service: string): Promise<boolean> {
    return this.entry(service).deletePassword();
  }
}
