/**
 * @sshkit/keys - ECDSA Key Pair
 *
 * Private scalar plus its public point. Signs with the configured digest
 * (SHA-1 unless told otherwise) and returns DER-encoded (r, s).
 */

import { config, type DigestPolicy } from '../config';
import { logger, reasonOf } from '../logger';
import { CryptoError, InvalidFormatError, type SshPublicKey, type SshSigner } from '../types';
import { clearBytes } from '../utils';
import { encodeBlob } from './blob';
import {
  type EcCurve,
  type EcGroup,
  curveAlgorithmName,
  curveFieldSize,
  curveFromGroup,
  curveSize,
  groupOf,
} from './curve';
import { digestMessage } from './digest';
import { type EcPoint, curveImpl } from './provider';
import { EcdsaPublicKey, type EcdsaKeyOptions } from './public-key';

export class EcdsaKeyPair implements SshPublicKey, SshSigner {
  readonly curve: EcCurve;
  readonly digest: DigestPolicy;
  private readonly privateKey: Uint8Array;
  private readonly publicPoint: EcPoint;

  /**
   * @param group - Curve group; must designate P-256, P-384 or P-521
   * @param privateKey - Big-endian scalar, exactly the curve's field width (32/48/66 bytes). Copied.
   * @throws InvalidFormatError if the group is unsupported or the scalar is out of range
   */
  constructor(group: EcGroup, privateKey: Uint8Array, options: EcdsaKeyOptions = {}) {
    const curve = curveFromGroup(group);
    const impl = curveImpl(curve);

    if (privateKey.length !== curveFieldSize(curve) || !impl.utils.isValidPrivateKey(privateKey)) {
      logger.debug({ curve, length: privateKey.length }, 'Rejected ECDSA private key');
      throw new InvalidFormatError('Invalid private key');
    }

    this.curve = curve;
    this.privateKey = Uint8Array.from(privateKey);
    this.publicPoint = impl.ProjectivePoint.fromPrivateKey(this.privateKey);
    this.digest = options.digest ?? config.digest;
  }

  /**
   * Generate a random key pair.
   */
  static generate(curve: EcCurve = 'P-256', options: EcdsaKeyOptions = {}): EcdsaKeyPair {
    const scalar = curveImpl(curve).utils.randomPrivateKey();
    try {
      return new EcdsaKeyPair(groupOf(curve), scalar, options);
    } finally {
      clearBytes(scalar);
    }
  }

  size(): number {
    return curveSize(this.curve);
  }

  keytype(): string {
    return curveAlgorithmName(this.curve);
  }

  /**
   * Detached public key for this pair, with the same digest policy.
   */
  clonePublicKey(): EcdsaPublicKey {
    return new EcdsaPublicKey(groupOf(this.curve), this.publicPoint.toRawBytes(false), {
      digest: this.digest,
    });
  }

  /**
   * @throws EncodingError
   */
  blob(): Uint8Array {
    return encodeBlob(this.curve, this.publicPoint);
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return this.clonePublicKey().verify(message, signature);
  }

  /**
   * Deterministic (RFC 6979) ECDSA signature over the digest of `message`.
   *
   * @returns DER-encoded SEQUENCE { r INTEGER, s INTEGER }
   * @throws CryptoError if signing fails
   */
  sign(message: Uint8Array): Uint8Array {
    const hash = digestMessage(this.curve, this.digest, message);
    try {
      return curveImpl(this.curve).sign(hash, this.privateKey).toDERRawBytes();
    } catch (error) {
      logger.debug({ curve: this.curve, reason: reasonOf(error) }, 'Signing error');
      throw new CryptoError('Signing failed', 'SIGNING_FAILED');
    }
  }

  /**
   * Public text form; the private scalar is never printed.
   */
  toString(): string {
    return this.clonePublicKey().toString();
  }

  toJSON(): string {
    return this.toString();
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `EcdsaKeyPair { curve: '${this.curve}' }`;
  }
}
