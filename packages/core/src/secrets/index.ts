import type { KeystoreBackend } from '../config.js';
import { KeyringSecretStore } from './keyring.js';
import { MemorySecretStore } from './memory.js';
import type { SecretStore } from './types.js';

export type { SecretStore } from './types.js';
export { KeyringSecretStore } from './keyring.js';
export { MemorySecretStore } from './memory.js';

export function createSecretStore(backend: KeystoreBackend): SecretStore {
  switch (backend) {
    case 'keyring':
      return new KeyringSecretStore();
    case 'memory':
      return new MemorySecretStore();
  }
}
