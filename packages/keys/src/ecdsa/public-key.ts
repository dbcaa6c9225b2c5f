/**
 * @sshkit/keys - ECDSA Public Key
 *
 * An SSH ECDSA public key over P-256, P-384 or P-521. The point is held
 * as a @noble/curves projective point and never handed out.
 */

import { sha256 } from '@noble/hashes/sha256';
import { config, type DigestPolicy } from '../config';
import { SHA256_FINGERPRINT_PREFIX } from '../constants';
import { logger, reasonOf } from '../logger';
import { CryptoError, InvalidFormatError, type SshPublicKey } from '../types';
import { bytesToBase64 } from '../utils';
import { decodeBlob, encodeBlob } from './blob';
import {
  type EcCurve,
  type EcGroup,
  curveAlgorithmName,
  curveFromGroup,
  curveSize,
  groupOf,
} from './curve';
import { digestMessage } from './digest';
import { type EcPoint, curveImpl } from './provider';

export type EcdsaKeyOptions = {
  /** Digest for sign/verify; defaults to the configured policy */
  digest?: DigestPolicy;
};

export class EcdsaPublicKey implements SshPublicKey {
  readonly curve: EcCurve;
  readonly digest: DigestPolicy;
  private readonly point: EcPoint;

  /**
   * @param group - Curve group; must designate P-256, P-384 or P-521
   * @param point - SEC1-encoded public point (compressed or uncompressed)
   * @throws InvalidFormatError if the group is unsupported or the point is not on the curve
   */
  constructor(group: EcGroup, point: Uint8Array, options: EcdsaKeyOptions = {}) {
    const curve = curveFromGroup(group);

    let decoded: EcPoint;
    try {
      decoded = curveImpl(curve).ProjectivePoint.fromHex(point);
    } catch (error) {
      logger.debug({ curve, reason: reasonOf(error) }, 'Rejected ECDSA public point');
      throw new InvalidFormatError('Invalid public point');
    }

    this.curve = curve;
    this.point = decoded;
    this.digest = options.digest ?? config.digest;
  }

  /**
   * Build a public key from an SSH ECDSA blob.
   *
   * @throws UnsupportedCurveError | InvalidFormatError
   */
  static fromBlob(blob: Uint8Array, options: EcdsaKeyOptions = {}): EcdsaPublicKey {
    const { curve, point } = decodeBlob(blob);
    return new EcdsaPublicKey(groupOf(curve), point, options);
  }

  size(): number {
    return curveSize(this.curve);
  }

  keytype(): string {
    return curveAlgorithmName(this.curve);
  }

  /**
   * @throws EncodingError
   */
  blob(): Uint8Array {
    return encodeBlob(this.curve, this.point);
  }

  /**
   * Verify a DER-encoded ECDSA signature over `message`.
   *
   * @returns false if the signature does not match
   * @throws CryptoError if the signature is not a valid DER (r, s) pair
   */
  verify(message: Uint8Array, signature: Uint8Array): boolean {
    const impl = curveImpl(this.curve);

    try {
      impl.Signature.fromDER(signature);
    } catch (error) {
      logger.debug({ curve: this.curve, reason: reasonOf(error) }, 'Malformed signature');
      throw new CryptoError('Signature could not be parsed', 'SIGNATURE_MALFORMED');
    }

    const hash = digestMessage(this.curve, this.digest, message);
    try {
      // high-S is accepted
      return impl.verify(signature, hash, this.point.toRawBytes(false), {
        lowS: false,
        prehash: false,
        format: 'der',
      });
    } catch (error) {
      logger.debug({ curve: this.curve, reason: reasonOf(error) }, 'Verification error');
      throw new CryptoError('Signature verification failed', 'VERIFICATION_FAILED');
    }
  }

  /**
   * Same curve and the same point of that curve's group.
   */
  equals(other: EcdsaPublicKey): boolean {
    return this.curve === other.curve && this.point.equals(other.point);
  }

  /**
   * OpenSSH SHA-256 fingerprint: `SHA256:` + unpadded base64.
   */
  fingerprint(): string {
    return SHA256_FINGERPRINT_PREFIX + bytesToBase64(sha256(this.blob())).replace(/=+$/, '');
  }

  /**
   * `<algorithm> <base64(blob)>`
   */
  toString(): string {
    return `${this.keytype()} ${bytesToBase64(this.blob())}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
