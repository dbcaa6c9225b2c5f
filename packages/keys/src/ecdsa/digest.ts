/**
 * @sshkit/keys - ECDSA Message Digest
 *
 * 'sha1' hashes with SHA-1 on every curve. 'curve' follows RFC 5656 §6.2.1:
 * SHA-256 for P-256, SHA-384 for P-384, SHA-512 for P-521.
 */

import { sha1 } from '@noble/hashes/sha1';
import { sha256 } from '@noble/hashes/sha256';
import { sha384, sha512 } from '@noble/hashes/sha512';
import type { DigestPolicy } from '../config';
import type { EcCurve } from './curve';

export function digestMessage(curve: EcCurve, policy: DigestPolicy, message: Uint8Array): Uint8Array {
  if (policy === 'sha1') {
    return sha1(message);
  }

  switch (curve) {
    case 'P-256':
      return sha256(message);
    case 'P-384':
      return sha384(message);
    case 'P-521':
      return sha512(message);
  }
}
