/**
 * Core logic for the totp CLI: keystore-backed credentials, code generation, and the service index.
 */

// Configuration
export { loadConfig, defaultDataDir, indexPath, DEFAULTS, GENERATOR_BACKENDS, KEYSTORE_BACKENDS } from './config.js';
export type { TotpConfig, Env, GeneratorBackend, KeystoreBackend } from './config.js';

// Errors
export {
  TotpError,
  configurationError,
  generationError,
  keystoreError,
  errorMessage,
} from './errors.js';
export type { TotpErrorKind, TotpErrorCode } from './errors.js';

// Secret storage
export type { SecretStore } from './secrets/index.js';
export { KeyringSecretStore, MemorySecretStore, createSecretStore } from './secrets/index.js';

// Credentials
export { CredentialManager, assertServiceName } from './credentials/manager.js';
export {
  resolveSecret,
  secretFromUrl,
  normalizeSecret,
  classifyPromptInput,
  OTPAUTH_PREFIX,
} from './credentials/secret-input.js';
export type { SecretInput } from './credentials/secret-input.js';

// Code generation
export {
  TOTP_DIGITS,
  TOTP_PERIOD,
  OathtoolGenerator,
  OtpauthGenerator,
  oathtoolArgs,
  parseCode,
  runProcess,
  createGenerator,
} from './generator/index.js';
export type { CodeGenerator, OathtoolOptions, ProcessRunner, ProcessResult, RunOptions } from './generator/index.js';

// Clipboard
export type { Clipboard } from './clipboard/index.js';
export { SystemClipboard } from './clipboard/index.js';

// Local storage
export { LocalStore, DEFAULT_AUDIT_RETENTION } from './storage/sqlite.js';
export type { StoredService, AuditEvent, AuditEventType, LocalStoreOptions } from './storage/sqlite.js';

// Service operations
export { addService, updateService, removeService, generateCode, listServices } from './services.js';
export type { TotpContext, ServiceSummary, GenerateResult } from './services.js';
