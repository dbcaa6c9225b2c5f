/**
 * @sshkit/keys - ECDSA SSH Blob Codec
 *
 * Wire format (RFC 5656 §3.1):
 *
 *   string  algorithm name   "ecdsa-sha2-nistp256" | ...384 | ...521
 *   string  curve identifier "nistp256" | "nistp384" | "nistp521"
 *   string  Q                0x04 || X || Y, fixed-width big-endian
 */

import { UNCOMPRESSED_POINT_TAG } from '../constants';
import { SshReader, SshWriter } from '../sshbuf';
import { EncodingError, InvalidFormatError } from '../types';
import {
  type EcCurve,
  curveAlgorithmName,
  curveFieldSize,
  curveFromAlgorithmName,
  curveIdent,
  parseCurve,
} from './curve';
import type { EcPoint } from './provider';

export type DecodedBlob = {
  curve: EcCurve;
  /** Uncompressed SEC1 point */
  point: Uint8Array;
};

function uncompressedPointSize(curve: EcCurve): number {
  return 1 + 2 * curveFieldSize(curve);
}

/**
 * Serialize a public point as an SSH ECDSA public-key blob.
 *
 * @throws EncodingError if the point cannot be serialized for this curve
 */
export function encodeBlob(curve: EcCurve, point: EcPoint): Uint8Array {
  let q: Uint8Array;
  try {
    q = point.toRawBytes(false);
  } catch {
    throw new EncodingError('Public point serialization failed');
  }
  if (q.length !== uncompressedPointSize(curve) || q[0] !== UNCOMPRESSED_POINT_TAG) {
    throw new EncodingError('Public point does not match curve');
  }

  return new SshWriter()
    .writeUtf8(curveAlgorithmName(curve))
    .writeUtf8(curveIdent(curve))
    .writeString(q)
    .toBytes();
}

/**
 * Parse an SSH ECDSA public-key blob. The point is not validated against
 * the curve here; EcdsaPublicKey does that.
 *
 * @throws UnsupportedCurveError for an unknown algorithm or curve identifier
 * @throws InvalidFormatError on mismatched fields, truncation or trailing bytes
 */
export function decodeBlob(blob: Uint8Array): DecodedBlob {
  const reader = new SshReader(blob);

  const curve = curveFromAlgorithmName(reader.readUtf8());
  if (parseCurve(reader.readUtf8()) !== curve) {
    throw new InvalidFormatError('Curve identifier does not match algorithm');
  }

  const point = reader.readString();
  reader.assertEnd();

  if (point.length !== uncompressedPointSize(curve) || point[0] !== UNCOMPRESSED_POINT_TAG) {
    throw new InvalidFormatError('Invalid public point encoding');
  }

  return { curve, point };
}
