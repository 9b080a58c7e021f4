/**
 * OathtoolGenerator — runs `oathtool --totp --base32 <secret>` and reads the code from stdout.
 */

import { DEFAULTS } from '../config.js';
import { errorMessage, generationError } from '../errors.js';
import { parseCode } from './parse.js';
import { errnoCode, runProcess, type ProcessResult, type ProcessRunner } from './process.js';
import type { CodeGenerator } from './types.js';

export interface OathtoolOptions {
  /** Binary name or path */
  path?: string;
  timeoutMs?: number;
  run?: ProcessRunner;
}

/** `--` ends option parsing, so a secret starting with "-" is never read as a flag. */
export function oathtoolArgs(secret: string): string[] {
  return ['--totp', '--base32', '--', secret];
}

export class OathtoolGenerator implements CodeGenerator {
  readonly name = 'oathtool';
  private readonly path: string;
  private readonly timeoutMs: number;
  private readonly run: ProcessRunner;

  constructor(options: OathtoolOptions = {}) {
    this.path = options.path ?? DEFAULTS.oathtoolPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.generatorTimeoutMs;
    this.run = options.run ?? runProcess;
  }

  async generate(secret: string): Promise<string> {
    let result: ProcessResult;
    try {
      result = await this.run(this.path, oathtoolArgs(secret), { timeoutMs: this.timeoutMs });
    } catch (err: unknown) {
      if (errnoCode(err) === 'ENOENT') {
        throw generationError(`"${this.path}" was not found. Install oath-toolkit or set TOTP_OATHTOOL.`, {
          command: this.path,
        });
      }
      throw generationError(`Failed to run "${this.path}": ${errorMessage(err)}`, { command: this.path });
    }

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim().split(/\r?\n/)[0];
      throw generationError(
        `"${this.path}" exited with code ${result.exitCode}${reason ? `: ${reason}` : ''}`,
        { command: this.path, exitCode: result.exitCode, stderr: result.stderr.trim() },
      );
    }

    return parseCode(result.stdout);
  }

  /** First line of `oathtool --version`, or null when the binary cannot be run. */
  async version(): Promise<string | null> {
    try {
      const result = await this.run(this.path, ['--version'], { timeoutMs: this.timeoutMs });
      if (result.exitCode !== 0) return null;
      return result.stdout.trim().split(/\r?\n/)[0] || null;
    } catch {
      // not installed
      return null;
    }
  }
}
