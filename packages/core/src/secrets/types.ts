/**
 * Secret storage interface.
 * Implementations: KeyringSecretStore (OS keystore), MemorySecretStore (tests, dry runs).
 */

export interface SecretStore {
  /** Human-readable backend name, shown by `totp doctor` */
  readonly backend: string;
  /** Store a secret for a service, replacing any previous one */
  set(service: string, secret: string): Promise<void>;
  /** Retrieve a stored secret, or null if not found */
  get(service: string): Promise<string | null>;
  /** Delete a stored secret; resolves false when there was nothing to delete */
  delete(service: string): Promise<boolean>;
}
