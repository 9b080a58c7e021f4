import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CredentialManager, assertServiceName } from '../manager.js';
import { MemorySecretStore } from '../../secrets/memory.js';
import type { SecretStore } from '../../secrets/types.js';

class BrokenSecretStore implements SecretStore {
  readonly backend = 'broken';

  async set(): Promise<void> {
    throw new Error('locked');
  }

  async get(): Promise<string | null> {
    throw new Error('locked');
  }

  async delete(): Promise<boolean> {
    throw new Error('locked');
  }
}

describe('assertServiceName', () => {
  it('trims the name', () => {
    assert.equal(assertServiceName('  github '), 'github');
  });

  it('rejects missing and blank names', () => {
    assert.throws(() => assertServiceName(undefined), { kind: 'usage', code: 'INVALID_SERVICE' });
    assert.throws(() => assertServiceName('   '), { kind: 'usage', code: 'INVALID_SERVICE' });
  });
});

describe('CredentialManager', () => {
  it('returns the stored secret', async () => {
    const manager = new CredentialManager(new MemorySecretStore());
    await manager.store('github', 'JBSWY3DPEHPK3PXP');
    assert.equal(await manager.retrieve('github'), 'JBSWY3DPEHPK3PXP');
  });

  it('replaces the previous secret on update', async () => {
    const manager = new CredentialManager(new MemorySecretStore());
    await manager.store('github', 'AAAAAAAA');
    await manager.update('github', 'BBBBBBBB');
    assert.equal(await manager.retrieve('github'), 'BBBBBBBB');
  });

  it('returns null for an unconfigured service', async () => {
    const manager = new CredentialManager(new MemorySecretStore());
    assert.equal(await manager.retrieve('gitlab'), null);
  });

  it('treats an empty stored secret as absent', async () => {
    const manager = new CredentialManager(new MemorySecretStore({ gitlab: '' }));
    assert.equal(await manager.retrieve('gitlab'), null);
  });

  it('raises a configuration error when a required service is missing', async () => {
    const manager = new CredentialManager(new MemorySecretStore());
    await assert.rejects(manager.require('gitlab'), {
      kind: 'configuration',
      code: 'SERVICE_NOT_FOUND',
      message: 'Service "gitlab" is not configured.',
    });
  });

  it('removes a secret', async () => {
    const manager = new CredentialManager(new MemorySecretStore({ github: 'AAAAAAAA' }));
    assert.equal(await manager.remove('github'), true);
    assert.equal(await manager.retrieve('github'), null);
    assert.equal(await manager.remove('github'), false);
  });

  it('wraps backend failures as keystore errors', async () => {
    const manager = new CredentialManager(new BrokenSecretStore());
    await assert.rejects(manager.retrieve('github'), {
      kind: 'keystore',
      code: 'KEYSTORE_FAILED',
      message: 'Failed to read secret for "github" in the broken keystore: locked',
    });
    await assert.rejects(manager.store('github', 'AAAAAAAA'), { code: 'KEYSTORE_FAILED' });
  });
});
