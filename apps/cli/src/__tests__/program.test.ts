import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalStore, MemorySecretStore, generationError, indexPath, type Clipboard, type CodeGenerator, type TotpConfig } from '@totp-keyring/core';
import { defaultRuntime, runCli, type CliRuntime } from '../program.js';

class FixedGenerator implements CodeGenerator {
  readonly name = 'fixed';
  failure: Error | null = null;

  constructor(private readonly code: string) {}

  async generate(): Promise<string> {
    if (this.failure) throw this.failure;
    return this.code;
  }
}

class FakeClipboard implements Clipboard {
  readonly written: string[] = [];
  failure: Error | null = null;

  async write(text: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.written.push(text);
  }
}

describe('totp CLI', () => {
  let dir: string;
  let secrets: MemorySecretStore;
  let generator: FixedGenerator;
  let clipboard: FakeClipboard;
  let promptAnswer: string;
  let runtime: CliRuntime;
  let stdout: string[];
  let stderr: string[];

  function run(...args: string[]): Promise<number> {
    return runCli(['node', 'totp', ...args], runtime);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'totp-cli-'));
    secrets = new MemorySecretStore();
    generator = new FixedGenerator('654321');
    clipboard = new FakeClipboard();
    promptAnswer = '';
    const config: TotpConfig = {
      dataDir: dir,
      dbPath: join(dir, 'totp.db'),
      generator: 'oathtool',
      oathtoolPath: 'oathtool',
      generatorTimeoutMs: 5000,
      keystore: 'keyring',
    };
    runtime = {
      loadConfig: () => config,
      secretStore: () => secrets,
      openStore: (cfg) => new LocalStore(indexPath(cfg)),
      generator: () => generator,
      clipboard: () => clipboard,
      readSecret: async () => promptAnswer,
      oathtoolVersion: async () => 'oathtool (OATH Toolkit) 2.6.11',
    };

    stdout = [];
    stderr = [];
    mock.method(console, 'log', (...args: unknown[]) => {
      stdout.push(args.map(String).join(' '));
    });
    mock.method(console, 'error', (...args: unknown[]) => {
      stderr.push(args.map(String).join(' '));
    });
    mock.method(console, 'warn', (...args: unknown[]) => {
      stderr.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    mock.restoreAll();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('add', () => {
    it('stores a secret given with --secret', async () => {
      assert.equal(await run('add', '-s', 'github', '--secret', 'ABC123'), 0);
      assert.equal(await secrets.get('github'), 'ABC123');
      assert.deepEqual(stdout, ['Key added for service github']);
    });

    it('stores the secret parameter of --url exactly like --secret', async () => {
      assert.equal(await run('add', '-s', 'by-url', '--url', 'otpauth://totp/Acme:bob?secret=ABC123&issuer=Acme'), 0);
      assert.equal(await run('add', '-s', 'by-secret', '--secret', 'ABC123'), 0);
      assert.equal(await secrets.get('by-url'), 'ABC123');
      assert.equal(await secrets.get('by-url'), await secrets.get('by-secret'));
    });

    it('prompts when neither --secret nor --url is given', async () => {
      promptAnswer = 'otpauth://totp/Acme:bob?secret=JBSWY3DP';
      assert.equal(await run('add', '-s', 'acme'), 0);
      assert.equal(await secrets.get('acme'), 'JBSWY3DP');
    });

    it('rejects an empty prompt answer', async () => {
      assert.equal(await run('add', '-s', 'acme'), 3);
      assert.deepEqual(stderr, ['Error: Secret must not be empty.']);
    });

    it('rejects --secret together with --url', async () => {
      assert.equal(await run('add', '-s', 'github', '--secret', 'ABC123', '--url', 'otpauth://totp/x?secret=ABC123'), 1);
      assert.deepEqual(stderr, ['Error: Use either --secret or --url, not both.']);
    });

    it('rejects a URL without a secret', async () => {
      assert.equal(await run('add', '-s', 'github', '--url', 'otpauth://totp/x?issuer=Acme'), 3);
      assert.deepEqual(stderr, ['Error: Malformed URL: no "secret" query parameter.']);
    });

    it('refuses to overwrite an existing service', async () => {
      await run('add', '-s', 'github', '--secret', 'AAAAAAAA');
      stderr.length = 0;
      assert.equal(await run('add', '-s', 'github', '--secret', 'BBBBBBBB'), 3);
      assert.deepEqual(stderr, ['Error: Service "github" already exists; use update instead.']);
      assert.equal(await secrets.get('github'), 'AAAAAAAA');
    });

    it('emits JSON when --json follows the command', async () => {
      assert.equal(await run('add', '-s', 'github', '--secret', 'JBSWY3DP', '--json'), 0);
      assert.equal(stdout.length, 1);
      assert.deepEqual(JSON.parse(stdout[0]), { ok: true, data: { service: 'github' } });
    });

    it('stays silent with --quiet', async () => {
      assert.equal(await run('add', '-s', 'github', '--secret', 'JBSWY3DP', '--quiet'), 0);
      assert.deepEqual(stdout, []);
    });

    it('requires a service name', async () => {
      assert.equal(await run('add', '--secret', 'ABC123'), 1);
      assert.deepEqual(stderr, ['Error: Service name is required (-s, --service).']);
    });
  });

  describe('update', () => {
    it('replaces the stored secret', async () => {
      await run('add', '-s', 'github', '--secret', 'AAAAAAAA');
      assert.equal(await run('update', '-s', 'github', '--secret', 'BBBBBBBB'), 0);
      assert.equal(await secrets.get('github'), 'BBBBBBBB');
      assert.deepEqual(stdout, ['Key added for service github', 'Key updated for service github']);
    });

    it('fails for an unconfigured service', async () => {
      assert.equal(await run('update', '-s', 'gitlab', '--secret', 'BBBBBBBB'), 3);
      assert.deepEqual(stderr, ['Error: Service "gitlab" is not configured.']);
    });
  });

  describe('generate', () => {
    beforeEach(async () => {
      await secrets.set('github', 'JBSWY3DP');
    });

    it('prints exactly the generated code on the default path', async () => {
      assert.equal(await run('-s', 'github'), 0);
      assert.deepEqual(stdout, ['654321']);
      assert.deepEqual(stderr, []);
      assert.deepEqual(clipboard.written, []);
    });

    it('prints the code from the generate command', async () => {
      assert.equal(await run('generate', '-s', 'github'), 0);
      assert.deepEqual(stdout, ['654321']);
    });

    it('copies the code with -c', async () => {
      assert.equal(await run('-s', 'github', '-c'), 0);
      assert.deepEqual(stdout, ['654321']);
      assert.deepEqual(clipboard.written, ['654321']);
      assert.deepEqual(stderr, ['Code copied to clipboard']);
    });

    it('still succeeds when the clipboard is unavailable', async () => {
      clipboard.failure = new Error('no display');
      assert.equal(await run('-s', 'github', '-c'), 0);
      assert.deepEqual(stdout, ['654321']);
      assert.deepEqual(stderr, ['Warning: Could not copy the code to the clipboard: no display']);
    });

    it('emits JSON with --json', async () => {
      assert.equal(await run('-s', 'github', '--json'), 0);
      assert.equal(stdout.length, 1);
      assert.deepEqual(JSON.parse(stdout[0]), {
        ok: true,
        data: { service: 'github', code: '654321', generator: 'fixed', copied: false },
      });
    });

    it('reports an unconfigured service as a configuration error', async () => {
      assert.equal(await run('-s', 'gitlab'), 3);
      assert.deepEqual(stdout, []);
      assert.deepEqual(stderr, ['Error: Service "gitlab" is not configured.']);
    });

    it('reports an unconfigured service as JSON', async () => {
      assert.equal(await run('-s', 'gitlab', '--json'), 3);
      assert.deepEqual(JSON.parse(stdout[0]), {
        ok: false,
        code: 'SERVICE_NOT_FOUND',
        message: 'Service "gitlab" is not configured.',
      });
    });

    it('prints debug lines when --debug follows the command', async () => {
      assert.equal(await run('generate', '-s', 'github', '--debug'), 0);
      assert.deepEqual(stdout, ['654321']);
      assert.deepEqual(stderr, [
        `[debug] data dir: ${dir}`,
        '[debug] keystore: keyring, generator: oathtool',
        'TOTP code for github (fixed):',
      ]);
    });

    it('emits JSON from the generate command', async () => {
      assert.equal(await run('generate', '-s', 'github', '--json'), 0);
      assert.deepEqual(JSON.parse(stdout[0]), {
        ok: true,
        data: { service: 'github', code: '654321', generator: 'fixed', copied: false },
      });
    });

    it('reports generator failures as runtime errors', async () => {
      generator.failure = generationError('"oathtool" exited with code 1');
      assert.equal(await run('-s', 'github'), 2);
      assert.deepEqual(stderr, ['Error: "oathtool" exited with code 1']);
    });

    it('requires a service name', async () => {
      assert.equal(await run(), 1);
      assert.deepEqual(stderr, ['Error: Service name is required (-s, --service).']);
    });
  });

  describe('remove and list', () => {
    it('lists services added through the CLI', async () => {
      await run('add', '-s', 'github', '--secret', 'AAAAAAAA');
      await run('add', '-s', 'aws', '--secret', 'BBBBBBBB');
      stdout.length = 0;

      assert.equal(await run('list', '--json'), 0);
      const payload = JSON.parse(stdout[0]) as { ok: boolean; data: Array<{ name: string }> };
      assert.equal(payload.ok, true);
      assert.deepEqual(
        payload.data.map((s) => s.name),
        ['aws', 'github'],
      );
    });

    it('prints a table of services', async () => {
      await run('add', '-s', 'github', '--secret', 'AAAAAAAA');
      stdout.length = 0;

      assert.equal(await run('list'), 0);
      const lines = stdout[0].split('\n');
      assert.equal(lines.length, 3);
      assert.deepEqual(lines[0].split(/\s+/), ['service', 'added', 'updated']);
      assert.equal(lines[2].split(/\s+/)[0], 'github');
    });

    it('says so when nothing is configured', async () => {
      assert.equal(await run('list'), 0);
      assert.deepEqual(stdout, ['No services configured. Use "totp add -s <service>" to add one.']);
    });

    it('removes a service from the keystore and the list', async () => {
      await run('add', '-s', 'github', '--secret', 'AAAAAAAA');
      assert.equal(await run('remove', '-s', 'github'), 0);
      assert.equal(await secrets.get('github'), null);
      stdout.length = 0;
      await run('list', '--json');
      assert.deepEqual(JSON.parse(stdout[0]), { ok: true, data: [] });
    });

    it('fails to remove an unknown service', async () => {
      assert.equal(await run('remove', '-s', 'gitlab'), 3);
    });
  });

  describe('doctor', () => {
    it('reports the configuration as JSON', async () => {
      assert.equal(await run('doctor', '--json'), 0);
      const payload = JSON.parse(stdout[0]) as {
        ok: boolean;
        data: { generator: string; keystore: string; oathtool: { version: string | null; ok: boolean } };
      };
      assert.equal(payload.ok, true);
      assert.equal(payload.data.generator, 'oathtool');
      assert.equal(payload.data.keystore, 'keyring');
      assert.deepEqual(payload.data.oathtool, {
        path: 'oathtool',
        version: 'oathtool (OATH Toolkit) 2.6.11',
        ok: true,
      });
    });
  });

  describe('memory keystore', () => {
    it('keeps the service index in memory so nothing is written to the data dir', async () => {
      const memoryConfig: TotpConfig = { ...runtime.loadConfig(), keystore: 'memory' };
      runtime = {
        ...runtime,
        loadConfig: () => memoryConfig,
        openStore: defaultRuntime().openStore,
      };

      assert.equal(await run('add', '-s', 'github', '--secret', 'JBSWY3DP'), 0);
      assert.equal(existsSync(memoryConfig.dbPath), false);

      stdout.length = 0;
      assert.equal(await run('list', '--json'), 0);
      assert.deepEqual(JSON.parse(stdout[0]), { ok: true, data: [] });
    });
  });

  it('rejects unknown options with a usage exit code', async () => {
    mock.method(process.stderr, 'write', () => true);
    assert.equal(await run('-s', 'github', '--bogus'), 1);
  });
});
