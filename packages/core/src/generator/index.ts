import type { TotpConfig } from '../config.js';
import { OathtoolGenerator } from './oathtool.js';
import { OtpauthGenerator } from './otpauth.js';
import type { CodeGenerator } from './types.js';

export { TOTP_DIGITS, TOTP_PERIOD } from './types.js';
export type { CodeGenerator } from './types.js';
export { OathtoolGenerator, oathtoolArgs } from './oathtool.js';
export type { OathtoolOptions } from './oathtool.js';
export { OtpauthGenerator } from './otpauth.js';
export { parseCode } from './parse.js';
export { runProcess } from './process.js';
export type { ProcessRunner, ProcessResult, RunOptions } from './process.js';

export function createGenerator(config: Pick<TotpConfig, 'generator' | 'oathtoolPath' | 'generatorTimeoutMs'>): CodeGenerator {
  switch (config.generator) {
    case 'oathtool':
      return new OathtoolGenerator({ path: config.oathtoolPath, timeoutMs: config.generatorTimeoutMs });
    case 'otpauth':
      return new OtpauthGenerator();
  }
}
