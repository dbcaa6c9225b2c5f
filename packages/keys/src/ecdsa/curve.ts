/**
 * @sshkit/keys - ECDSA Curve Registry
 *
 * The three NIST curves SSH defines for ECDSA, and their SSH names.
 * Every lookup is an exhaustive switch over EcCurve.
 */

import { NISTP256_ALGORITHM, NISTP384_ALGORITHM, NISTP521_ALGORITHM } from '../constants';
import { InvalidFormatError, UnsupportedCurveError } from '../types';

export type EcCurve = 'P-256' | 'P-384' | 'P-521';

export const EC_CURVES: readonly EcCurve[] = ['P-256', 'P-384', 'P-521'];

/**
 * Curve group handle, shaped like Web Crypto's EcKeyImportParams.
 * `namedCurve` carries the standard curve designation.
 */
export type EcGroup = {
  readonly namedCurve?: string;
};

/**
 * Key size in bits.
 */
export function curveSize(curve: EcCurve): 256 | 384 | 521 {
  switch (curve) {
    case 'P-256':
      return 256;
    case 'P-384':
      return 384;
    case 'P-521':
      return 521;
  }
}

/**
 * Coordinate width in bytes of an uncompressed point.
 */
export function curveFieldSize(curve: EcCurve): 32 | 48 | 66 {
  switch (curve) {
    case 'P-256':
      return 32;
    case 'P-384':
      return 48;
    case 'P-521':
      return 66;
  }
}

/**
 * SSH algorithm name, used on the wire and as the text-form prefix.
 */
export function curveAlgorithmName(curve: EcCurve): string {
  switch (curve) {
    case 'P-256':
      return NISTP256_ALGORITHM;
    case 'P-384':
      return NISTP384_ALGORITHM;
    case 'P-521':
      return NISTP521_ALGORITHM;
  }
}

/**
 * Curve identifier carried inside the SSH blob.
 */
export function curveIdent(curve: EcCurve): string {
  switch (curve) {
    case 'P-256':
      return 'nistp256';
    case 'P-384':
      return 'nistp384';
    case 'P-521':
      return 'nistp521';
  }
}

/**
 * Parse a curve identifier. Exact match only.
 *
 * @throws UnsupportedCurveError for anything but nistp256, nistp384, nistp521
 */
export function parseCurve(text: string): EcCurve {
  switch (text) {
    case 'nistp256':
      return 'P-256';
    case 'nistp384':
      return 'P-384';
    case 'nistp521':
      return 'P-521';
    default:
      throw new UnsupportedCurveError();
  }
}

/**
 * Inverse of curveAlgorithmName.
 *
 * @throws UnsupportedCurveError for any other name
 */
export function curveFromAlgorithmName(name: string): EcCurve {
  switch (name) {
    case NISTP256_ALGORITHM:
      return 'P-256';
    case NISTP384_ALGORITHM:
      return 'P-384';
    case NISTP521_ALGORITHM:
      return 'P-521';
    default:
      throw new UnsupportedCurveError();
  }
}

/**
 * Resolve a group handle to a supported curve.
 *
 * @throws InvalidFormatError if the group has no designation or names another curve
 */
export function curveFromGroup(group: EcGroup): EcCurve {
  switch (group.namedCurve) {
    case 'P-256':
      return 'P-256';
    case 'P-384':
      return 'P-384';
    case 'P-521':
      return 'P-521';
    default:
      throw new InvalidFormatError('Unsupported curve group');
  }
}

/**
 * Canonical group handle for a curve.
 */
export function groupOf(curve: EcCurve): EcGroup {
  return { namedCurve: curve };
}
