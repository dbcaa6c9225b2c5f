/**
 * @sshkit/keys
 *
 * ECDSA SSH keys over NIST P-256, P-384 and P-521: curve naming, the SSH
 * public-key blob and text form, and signing/verification.
 *
 * - Curve arithmetic is delegated to @noble/curves
 * - Signatures are DER-encoded (r, s); the digest is SHA-1 unless
 *   SSHKIT_ECDSA_DIGEST=curve or a per-key `digest` option says otherwise
 * - Private scalars are never logged or printed
 *
 * @example
 * ```typescript
 * import { EcdsaKeyPair, parsePublicKey } from '@sshkit/keys';
 *
 * const pair = EcdsaKeyPair.generate('P-384');
 * const line = pair.clonePublicKey().toString();
 * // "ecdsa-sha2-nistp384 AAAAE2VjZHNh..."
 *
 * const { key } = parsePublicKey(line);
 * const signature = pair.sign(message);
 * key.verify(message, signature); // true
 * ```
 */

export const KEYS_VERSION = '0.1.0';

// ECDSA keys, curve registry and blob codec
export {
  EC_CURVES,
  curveSize,
  curveFieldSize,
  curveAlgorithmName,
  curveIdent,
  parseCurve,
  curveFromAlgorithmName,
  curveFromGroup,
  groupOf,
  encodeBlob,
  decodeBlob,
  EcdsaPublicKey,
  EcdsaKeyPair,
  parsePublicKey,
  formatPublicKey,
  type EcCurve,
  type EcGroup,
  type DecodedBlob,
  type EcdsaKeyOptions,
  type ParsedPublicKey,
} from './ecdsa';

// SSH wire primitives
export { SshWriter, SshReader } from './sshbuf';

// Configuration and logging
export { loadConfig, DEFAULT_CONFIG, type KeysConfig, type DigestPolicy } from './config';
export { createLogger } from './logger';

// Utility functions
export { hexToBytes, bytesToHex, concatBytes, bytesToBase64, base64ToBytes } from './utils';

// Types and errors
export {
  KeyError,
  UnsupportedCurveError,
  InvalidFormatError,
  CryptoError,
  EncodingError,
  type KeyErrorCode,
  type SshKey,
  type SshPublicKey,
  type SshSigner,
} from './types';

// Constants
export {
  NISTP256_ALGORITHM,
  NISTP384_ALGORITHM,
  NISTP521_ALGORITHM,
  UNCOMPRESSED_POINT_TAG,
  SHA256_FINGERPRINT_PREFIX,
} from './constants';
