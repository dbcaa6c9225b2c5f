/**
 * @sshkit/keys - ECDSA Module
 *
 * Curve registry, SSH blob codec, and ECDSA public keys and key pairs.
 */

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
  type EcCurve,
  type EcGroup,
} from './curve';
export { encodeBlob, decodeBlob, type DecodedBlob } from './blob';
export { EcdsaPublicKey, type EcdsaKeyOptions } from './public-key';
export { EcdsaKeyPair } from './key-pair';
export { parsePublicKey, formatPublicKey, type ParsedPublicKey } from './text';
