/**
 * Thin wrapper over execFile so generators can be tested without spawning anything.
 */

import { execFile } from 'node:child_process';

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
}

/**
 * Resolves with the exit code for any process that ran to completion, including
 * non-zero exits. Rejects when the process could not be started or was killed.
 */
export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { timeout: options.timeoutMs, encoding: 'utf-8' }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      if (typeof error.code === 'number') {
        resolve({ exitCode: error.code, stdout, stderr });
        return;
      }
      reject(error);
    });
  });

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
