import type { Command } from 'commander';
import { formatTable } from './util/table.js';
import { errorCode, errorDetails } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

/**
 * A flag counts when it is set on the command or on any ancestor. Both levels
 * declare the flags with a false default, so a plain merge would let the
 * program's default hide a subcommand's value.
 */
export function outputOptionsFromCommand(command: Command): OutputOptions {
  const output: OutputOptions = { json: false, quiet: false, verbose: false, debug: false };
  for (let current: Command | null = command; current; current = current.parent) {
    const opts = current.opts();
    output.json ||= Boolean(opts.json);
    output.quiet ||= Boolean(opts.quiet);
    output.verbose ||= Boolean(opts.verbose);
    output.debug ||= Boolean(opts.debug);
  }
  return output;
}

/** Primary result of a command (the code itself); printed even under --quiet. */
export function printResult(message: string): void {
  console.log(message);
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

/** Status lines go to stderr so stdout carries only the result. */
export function printInfo(message: string, output: OutputOptions): void {
  if (!output.quiet && !output.json) {
    console.error(message);
  }
}

export function printVerbose(message: string, output: OutputOptions): void {
  if (output.verbose || output.debug) {
    printInfo(message, output);
  }
}

export function printDebug(message: string, output: OutputOptions): void {
  if (output.debug) {
    console.error(`[debug] ${message}`);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Record<string, unknown>[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const message = error instanceof Error ? error.message : String(error);
  const details = errorDetails(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: errorCode(error),
      message,
    };
    if (output.debug) {
      payload.details =
        details ?? (error instanceof Error ? { stack: error.stack } : { raw: String(error) });
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (details !== undefined) {
      console.error('Details:', JSON.stringify(details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential output', false)
    .option('--verbose', 'Show additional context', false)
    .option('-d, --debug', 'Show internal error details and stacks', false);
}
