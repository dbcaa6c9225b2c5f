/**
 * @sshkit/keys - ECDSA Curve Provider
 *
 * Binds each supported curve to its @noble/curves implementation.
 * All point and scalar arithmetic happens inside these objects.
 */

import type { CurveFn, ProjPointType } from '@noble/curves/abstract/weierstrass';
import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { p521 } from '@noble/curves/p521';
import type { EcCurve } from './curve';

/** Public point as held by the provider */
export type EcPoint = ProjPointType<bigint>;

export function curveImpl(curve: EcCurve): CurveFn {
  switch (curve) {
    case 'P-256':
      return p256;
    case 'P-384':
      return p384;
    case 'P-521':
      return p521;
  }
}
