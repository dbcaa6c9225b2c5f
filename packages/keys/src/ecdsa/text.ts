/**
 * @sshkit/keys - ECDSA Public Key Text Form
 *
 * The one-line form used by authorized_keys and *.pub files:
 * `<algorithm> <base64(blob)> [comment]`
 */

import { InvalidFormatError } from '../types';
import { base64ToBytes } from '../utils';
import { curveFromAlgorithmName } from './curve';
import { EcdsaPublicKey, type EcdsaKeyOptions } from './public-key';

export type ParsedPublicKey = {
  key: EcdsaPublicKey;
  comment?: string;
};

/**
 * Parse a public key line.
 *
 * @throws UnsupportedCurveError if the algorithm is not an ECDSA NIST curve
 * @throws InvalidFormatError on bad base64, a malformed blob, or an algorithm
 *   token that does not match the blob
 */
export function parsePublicKey(line: string, options: EcdsaKeyOptions = {}): ParsedPublicKey {
  const match = /^(\S+)\s+(\S+)(?:\s+(.*))?$/.exec(line.trim());
  if (!match) {
    throw new InvalidFormatError('Invalid public key line');
  }
  const [, algorithm, body, comment] = match;

  const curve = curveFromAlgorithmName(algorithm);
  const key = EcdsaPublicKey.fromBlob(base64ToBytes(body), options);
  if (key.curve !== curve) {
    throw new InvalidFormatError('Algorithm does not match key blob');
  }

  return comment ? { key, comment } : { key };
}

/**
 * Format a public key line, with an optional trailing comment.
 */
export function formatPublicKey(key: EcdsaPublicKey, comment?: string): string {
  const text = key.toString();
  return comment ? `${text} ${comment}` : text;
}
