import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { classifyPromptInput, normalizeSecret, resolveSecret, secretFromUrl } from '../secret-input.js';

describe('secretFromUrl', () => {
  it('extracts the secret query parameter from an otpauth URL', () => {
    assert.equal(secretFromUrl('otpauth://totp/Example:alice?secret=ABC123&issuer=Example'), 'ABC123');
  });

  it('extracts the secret regardless of parameter order', () => {
    assert.equal(secretFromUrl('otpauth://totp/Example?issuer=Example&period=30&secret=JBSWY3DP'), 'JBSWY3DP');
  });

  it('rejects a URL without a secret', () => {
    assert.throws(() => secretFromUrl('otpauth://totp/Example?issuer=Example'), {
      kind: 'configuration',
      code: 'INVALID_URL',
      message: 'Malformed URL: no "secret" query parameter.',
    });
  });

  it('rejects an empty secret parameter', () => {
    assert.throws(() => secretFromUrl('otpauth://totp/Example?secret=&issuer=Example'), { code: 'INVALID_URL' });
  });

  it('rejects text that is not a URL', () => {
    assert.throws(() => secretFromUrl('not a url'), {
      code: 'INVALID_URL',
      message: 'Malformed URL: could not parse it.',
    });
  });
});

describe('resolveSecret', () => {
  it('gives the same secret for URL and bare forms', () => {
    const fromUrl = resolveSecret({ kind: 'url', value: 'otpauth://totp/Acme:bob?secret=ABC123' });
    const fromSecret = resolveSecret({ kind: 'secret', value: 'ABC123' });
    assert.equal(fromUrl, 'ABC123');
    assert.equal(fromSecret, fromUrl);
  });

  it('rejects a blank secret', () => {
    assert.throws(() => normalizeSecret('  '), { kind: 'configuration', code: 'INVALID_SECRET' });
  });
});

describe('classifyPromptInput', () => {
  it('treats otpauth:// input as a URL', () => {
    assert.deepEqual(classifyPromptInput(' otpauth://totp/x?secret=AB '), {
      kind: 'url',
      value: 'otpauth://totp/x?secret=AB',
    });
  });

  it('treats anything else as a bare secret', () => {
    assert.deepEqual(classifyPromptInput('JBSWY3DP\n'), { kind: 'secret', value: 'JBSWY3DP' });
  });
});
