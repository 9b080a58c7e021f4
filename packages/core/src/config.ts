/**
 * Runtime configuration, read from environment variables.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { configurationError } from './errors.js';

export const GENERATOR_BACKENDS = ['oathtool', 'otpauth'] as const;
export type GeneratorBackend = (typeof GENERATOR_BACKENDS)[number];

export const KEYSTORE_BACKENDS = ['keyring', 'memory'] as const;
export type KeystoreBackend = (typeof KEYSTORE_BACKENDS)[number];

export const DEFAULTS = {
  generator: 'oathtool',
  oathtoolPath: 'oathtool',
  /** Upper bound on a single oathtool run */
  generatorTimeoutMs: 5_000,
  keystore: 'keyring',
} as const satisfies {
  generator: GeneratorBackend;
  oathtoolPath: string;
  generatorTimeoutMs: number;
  keystore: KeystoreBackend;
};

export interface TotpConfig {
  dataDir: string;
  dbPath: string;
  generator: GeneratorBackend;
  oathtoolPath: string;
  generatorTimeoutMs: number;
  keystore: KeystoreBackend;
}

export type Env = Record<string, string | undefined>;

export function defaultDataDir(): string {
  return join(homedir(), '.local', 'share', 'totp');
}

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = readEnv(env, key);
  if (raw === undefined) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw configurationError(`Invalid ${key} "${raw}". Expected one of: ${choices.join(', ')}.`, 'INVALID_CONFIG');
  }
  return match;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readEnv(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw configurationError(`Invalid ${key} "${raw}". Expected a positive integer.`, 'INVALID_CONFIG');
  }
  return value;
}

export function loadConfig(env: Env = process.env): TotpConfig {
  const dataDir = readEnv(env, 'TOTP_HOME') ?? defaultDataDir();
  return {
    dataDir,
    dbPath: join(dataDir, 'totp.db'),
    generator: readChoice(env, 'TOTP_GENERATOR', GENERATOR_BACKENDS, DEFAULTS.generator),
    oathtoolPath: readEnv(env, 'TOTP_OATHTOOL') ?? DEFAULTS.oathtoolPath,
    generatorTimeoutMs: readPositiveInt(env, 'TOTP_GENERATOR_TIMEOUT_MS', DEFAULTS.generatorTimeoutMs),
    keystore: readChoice(env, 'TOTP_KEYSTORE', KEYSTORE_BACKENDS, DEFAULTS.keystore),
  };
}

/**
 * Where the service index lives. The memory keystore forgets its secrets when
 * the process exits, so its index must not outlive the process either.
 */
export function indexPath(config: Pick<TotpConfig, 'keystore' | 'dbPath'>): string {
  return config.keystore === 'memory' ? ':memory:' : config.dbPath;
}
