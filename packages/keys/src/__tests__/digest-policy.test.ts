/**
 * @sshkit/keys - Configured Digest Policy Tests
 *
 * SSHKIT_ECDSA_DIGEST is read when the package loads, so each case stubs the
 * environment and imports fresh modules.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { sha1 } from '@noble/hashes/sha1';
import { sha384 } from '@noble/hashes/sha512';
import { groupOf } from '../ecdsa/curve';
import { scalarOne } from './vectors';

const message = new TextEncoder().encode('configured digest');

async function loadKeys() {
  vi.resetModules();
  const { EcdsaKeyPair } = await import('../ecdsa/key-pair');
  const { EcdsaPublicKey } = await import('../ecdsa/public-key');
  return { EcdsaKeyPair, EcdsaPublicKey };
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.resetModules();
});

describe('SSHKIT_ECDSA_DIGEST', () => {
  it('defaults keys without options to the curve-matched digest when set to curve', async () => {
    vi.stubEnv('SSHKIT_ECDSA_DIGEST', 'curve');
    const { EcdsaKeyPair, EcdsaPublicKey } = await loadKeys();

    const pair = new EcdsaKeyPair(groupOf('P-384'), scalarOne(48));
    const key = new EcdsaPublicKey(groupOf('P-384'), p384.getPublicKey(scalarOne(48), false));

    expect(pair.digest).toBe('curve');
    expect(key.digest).toBe('curve');
    expect(pair.sign(message)).toEqual(p384.sign(sha384(message), scalarOne(48)).toDERRawBytes());
    expect(key.verify(message, pair.sign(message))).toBe(true);
  });

  it('defaults keys without options to SHA-1 when set to sha1', async () => {
    vi.stubEnv('SSHKIT_ECDSA_DIGEST', 'sha1');
    const { EcdsaKeyPair } = await loadKeys();

    const pair = new EcdsaKeyPair(groupOf('P-256'), scalarOne(32));

    expect(pair.digest).toBe('sha1');
    expect(pair.sign(message)).toEqual(p256.sign(sha1(message), scalarOne(32)).toDERRawBytes());
  });

  it('is overridden by a per-key option', async () => {
    vi.stubEnv('SSHKIT_ECDSA_DIGEST', 'curve');
    const { EcdsaKeyPair } = await loadKeys();

    const pair = new EcdsaKeyPair(groupOf('P-256'), scalarOne(32), { digest: 'sha1' });

    expect(pair.digest).toBe('sha1');
    expect(pair.sign(message)).toEqual(p256.sign(sha1(message), scalarOne(32)).toDERRawBytes());
  });
});
