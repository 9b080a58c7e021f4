/**
 * The `totp` command tree.
 * Each command opens the service index, performs one operation, and closes it again.
 */

import { Command, CommanderError } from 'commander';
import { existsSync } from 'node:fs';
import {
  CredentialManager,
  LocalStore,
  OathtoolGenerator,
  SystemClipboard,
  addService,
  classifyPromptInput,
  createGenerator,
  createSecretStore,
  errorMessage,
  generateCode,
  indexPath,
  listServices,
  loadConfig,
  removeService,
  resolveSecret,
  updateService,
  type Clipboard,
  type CodeGenerator,
  type SecretInput,
  type SecretStore,
  type TotpConfig,
  type TotpContext,
} from '@totp-keyring/core';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printDebug,
  printError,
  printHuman,
  printHumanTable,
  printInfo,
  printResult,
  printVerbose,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { readSecret } from './util/prompt.js';

export const VERSION = '1.0.0';

const SECRET_PROMPT = 'Enter the secret or URL: ';

/** Everything a command touches outside the process; replaced wholesale in tests. */
export interface CliRuntime {
  loadConfig(): TotpConfig;
  secretStore(config: TotpConfig): SecretStore;
  openStore(config: TotpConfig): LocalStore;
  generator(config: TotpConfig): CodeGenerator;
  clipboard(): Clipboard;
  readSecret(prompt: string): Promise<string>;
  oathtoolVersion(config: TotpConfig): Promise<string | null>;
}

export function defaultRuntime(): CliRuntime {
  return {
    loadConfig: () => loadConfig(),
    secretStore: (config) => createSecretStore(config.keystore),
    openStore: (config) => new LocalStore(indexPath(config)),
    generator: (config) => createGenerator(config),
    clipboard: () => new SystemClipboard(),
    readSecret: (prompt) => readSecret(prompt),
    oathtoolVersion: (config) =>
      new OathtoolGenerator({ path: config.oathtoolPath, timeoutMs: config.generatorTimeoutMs }).version(),
  };
}

interface ServiceOptions {
  service?: string;
}

interface SecretOptions extends ServiceOptions {
  secret?: string;
  url?: string;
}

interface GenerateOptions extends ServiceOptions {
  copy?: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────────

function requireService(opts: ServiceOptions): string {
  const service = opts.service?.trim();
  if (!service) {
    throw usageError('Service name is required (-s, --service).');
  }
  return service;
}

async function secretInputFromOptions(opts: SecretOptions, runtime: CliRuntime): Promise<SecretInput> {
  if (opts.secret !== undefined && opts.url !== undefined) {
    throw usageError('Use either --secret or --url, not both.');
  }
  if (opts.url !== undefined) return { kind: 'url', value: opts.url };
  if (opts.secret !== undefined) return { kind: 'secret', value: opts.secret };
  return classifyPromptInput(await runtime.readSecret(SECRET_PROMPT));
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

export function buildProgram(runtime: CliRuntime, onExitCode: (code: number) => void): Command {
  async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
    const output = outputOptionsFromCommand(command);
    try {
      await fn(output);
    } catch (error: unknown) {
      printError(error, output);
      onExitCode(toExitCode(error));
    }
  }

  async function withContext<T>(output: OutputOptions, fn: (ctx: TotpContext, config: TotpConfig) => Promise<T>): Promise<T> {
    const config = runtime.loadConfig();
    printDebug(`data dir: ${config.dataDir}`, output);
    printDebug(`keystore: ${config.keystore}, generator: ${config.generator}`, output);

    const store = runtime.openStore(config);
    try {
      store.migrate();
      const ctx: TotpContext = {
        credentials: new CredentialManager(runtime.secretStore(config)),
        generator: runtime.generator(config),
        store,
      };
      return await fn(ctx, config);
    } finally {
      store.close();
    }
  }

  async function generate(opts: GenerateOptions, output: OutputOptions): Promise<void> {
    const service = requireService(opts);
    const result = await withContext(output, (ctx) => generateCode(ctx, service));
    printVerbose(`TOTP code for ${result.service} (${result.generator}):`, output);

    let copied = false;
    if (opts.copy) {
      try {
        await runtime.clipboard().write(result.code);
        copied = true;
      } catch (err: unknown) {
        printWarning(`Could not copy the code to the clipboard: ${errorMessage(err)}`, output);
      }
    }

    if (output.json) {
      printCommandSuccess({ ...result, copied }, output);
      return;
    }
    printResult(result.code);
    if (copied) printInfo('Code copied to clipboard', output);
  }

  const program = new Command();

  program
    .name('totp')
    .description('TOTP codes for the command line, with secrets kept in the OS keystore')
    .option('-s, --service <name>', 'Service name')
    .option('-c, --copy', 'Copy the code to the clipboard', false)
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential output', false)
    .option('--verbose', 'Show additional context', false)
    .option('-d, --debug', 'Show internal error details and stacks', false)
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .showHelpAfterError('(run with --help for usage)')
    .helpOption('-h, --help', 'display help')
    .version(VERSION, '-v, --version', 'Show version number');

  program.exitOverride();
  program.action(async function (this: Command, opts: GenerateOptions) {
    await runCommand(this, (output) => generate(opts, output));
  });
  program.addHelpText(
    'after',
    `
Examples:
  totp -s github
  totp -s github -c
`,
  );

  // ── add / update ───────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      program
        .command('add')
        .description('Store the secret for a new service')
        .option('-s, --service <name>', 'Service name')
        .option('--secret <secret>', 'Base32 secret')
        .option('--url <url>', 'otpauth:// URL carrying a secret parameter')
        .action(async function (this: Command, opts: SecretOptions) {
          await runCommand(this, async (output) => {
            const service = requireService(opts);
            const secret = resolveSecret(await secretInputFromOptions(opts, runtime));
            const result = await withContext(output, (ctx) => addService(ctx, service, secret));
            printCommandSuccess(result, output, `Key added for service ${result.service}`);
          });
        }),
    ),
    [
      'totp add -s github --secret JBSWY3DPEHPK3PXP',
      "totp add -s github --url 'otpauth://totp/GitHub:me?secret=JBSWY3DPEHPK3PXP&issuer=GitHub'",
      'totp add -s github   (prompts for the secret)',
    ],
  );

  withExamples(
    withOutputFlags(
      program
        .command('update')
        .description('Replace the secret of an existing service')
        .option('-s, --service <name>', 'Service name')
        .option('--secret <secret>', 'Base32 secret')
        .option('--url <url>', 'otpauth:// URL carrying a secret parameter')
        .action(async function (this: Command, opts: SecretOptions) {
          await runCommand(this, async (output) => {
            const service = requireService(opts);
            const secret = resolveSecret(await secretInputFromOptions(opts, runtime));
            const result = await withContext(output, (ctx) => updateService(ctx, service, secret));
            printCommandSuccess(result, output, `Key updated for service ${result.service}`);
          });
        }),
    ),
    ['totp update -s github --secret JBSWY3DPEHPK3PXP'],
  );

  // ── generate ───────────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      program
        .command('generate')
        .description('Print the current code for a service (same as running totp without a command)')
        .option('-s, --service <name>', 'Service name')
        .option('-c, --copy', 'Copy the code to the clipboard', false)
        .action(async function (this: Command, opts: GenerateOptions) {
          await runCommand(this, (output) => generate(opts, output));
        }),
    ),
    ['totp generate -s github', 'totp generate -s github --json'],
  );

  // ── remove / list ──────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      program
        .command('remove')
        .description('Delete the secret of a service')
        .option('-s, --service <name>', 'Service name')
        .action(async function (this: Command, opts: ServiceOptions) {
          await runCommand(this, async (output) => {
            const service = requireService(opts);
            const result = await withContext(output, (ctx) => removeService(ctx, service));
            if (!result.secretRemoved) {
              printWarning(`No secret was stored for ${result.service}; removed it from the list.`, output);
            }
            printCommandSuccess(result, output, `Key removed for service ${result.service}`);
          });
        }),
    ),
    ['totp remove -s github'],
  );

  withExamples(
    withOutputFlags(
      program
        .command('list')
        .description('List configured services')
        .action(async function (this: Command) {
          await runCommand(this, async (output) => {
            const services = await withContext(output, async (ctx) => listServices(ctx));
            if (output.json) {
              printCommandSuccess(services, output);
              return;
            }
            if (services.length === 0) {
              printHuman('No services configured. Use "totp add -s <service>" to add one.', output);
              return;
            }
            printHumanTable(
              ['service', 'added', 'updated'],
              services.map((s) => ({ service: s.name, added: s.createdAt, updated: s.updatedAt })),
              output,
            );
          });
        }),
    ),
    ['totp list', 'totp list --json'],
  );

  // ── doctor ─────────────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      program
        .command('doctor')
        .description('Check the environment and configuration')
        .action(async function (this: Command) {
          await runCommand(this, async (output) => {
            const config = runtime.loadConfig();
            const nodeVersion = process.version;
            const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
            const oathtool = await runtime.oathtoolVersion(config);

            const payload = {
              node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
              generator: config.generator,
              oathtool: { path: config.oathtoolPath, version: oathtool, ok: oathtool !== null },
              keystore: config.keystore,
              paths: {
                dataDir: config.dataDir,
                dataDirExists: existsSync(config.dataDir),
                dbPath: config.dbPath,
                dbPathExists: existsSync(config.dbPath),
              },
            };

            if (output.json) {
              printCommandSuccess(payload, output);
              return;
            }

            printHuman('totp doctor', output);
            printHuman('===========', output);
            printHuman('', output);
            printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
            printHuman(`Generator:  ${config.generator}`, output);
            printHuman(`oathtool:   ${oathtool ? `${oathtool} ✓` : `✗ "${config.oathtoolPath}" not found`}`, output);
            printHuman(`Keystore:   ${config.keystore}`, output);
            printHuman(`Data dir:   ${config.dataDir} ${payload.paths.dataDirExists ? '(exists)' : '(will be created)'}`, output);
            if (config.generator === 'oathtool' && !oathtool) {
              printWarning('Codes cannot be generated until oathtool is installed or TOTP_GENERATOR=otpauth is set.', output);
            }
          });
        }),
    ),
    ['totp doctor', 'totp doctor --json'],
  );

  return program;
}

// ── parse ────────────────────────────────────────────────────────────

/** Parses argv, runs one command, and resolves with the process exit code. */
export async function runCli(argv: string[], runtime: CliRuntime = defaultRuntime()): Promise<number> {
  let exitCode = EXIT_CODE_SUCCESS;
  const program = buildProgram(runtime, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, the version, or its own error message
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        return EXIT_CODE_SUCCESS;
      }
      return EXIT_CODE_USAGE;
    }
    printError(error, outputOptionsFromCommand(program));
    return toExitCode(error);
  }
}
