/**
 * @sshkit/keys - Error Taxonomy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  CryptoError,
  EncodingError,
  InvalidFormatError,
  KeyError,
  UnsupportedCurveError,
} from '../types';
import { parseCurve } from '../ecdsa/curve';

describe('KeyError subclasses', () => {
  it('carry a name and code', () => {
    const errors = [
      new UnsupportedCurveError(),
      new InvalidFormatError(),
      new CryptoError('Signing failed', 'SIGNING_FAILED'),
      new EncodingError(),
    ];

    expect(errors.map((e) => [e.name, e.code])).toEqual([
      ['UnsupportedCurveError', 'UNSUPPORTED_CURVE'],
      ['InvalidFormatError', 'INVALID_FORMAT'],
      ['CryptoError', 'SIGNING_FAILED'],
      ['EncodingError', 'ENCODING_FAILED'],
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(KeyError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('does not echo rejected input in the message', () => {
    expect(() => parseCurve('secret-input')).toThrow('Unsupported curve');
  });
});
