/**
 * @sshkit/keys - Type Definitions
 *
 * Key capability interfaces and the error taxonomy.
 */

/**
 * Metadata every SSH key exposes.
 */
export interface SshKey {
  /** Key size in bits */
  size(): number;
  /** SSH algorithm name, e.g. `ecdsa-sha2-nistp256` */
  keytype(): string;
}

/**
 * Read-only public key capability: wire encoding and signature verification.
 */
export interface SshPublicKey extends SshKey {
  /** Canonical SSH public-key blob */
  blob(): Uint8Array;
  /**
   * Verify a signature over a message.
   *
   * @returns false when the signature does not match
   * @throws CryptoError when the signature cannot be evaluated at all
   */
  verify(message: Uint8Array, signature: Uint8Array): boolean;
}

/**
 * Signing capability, held only by private key material.
 */
export interface SshSigner {
  sign(message: Uint8Array): Uint8Array;
}

/**
 * Error codes for categorized error handling.
 */
export type KeyErrorCode =
  | 'UNSUPPORTED_CURVE'
  | 'INVALID_FORMAT'
  | 'SIGNING_FAILED'
  | 'SIGNATURE_MALFORMED'
  | 'VERIFICATION_FAILED'
  | 'ENCODING_FAILED';

/**
 * Base class for all errors raised by this package.
 * Messages never include key material.
 */
export class KeyError extends Error {
  readonly code: KeyErrorCode;

  constructor(message: string, code: KeyErrorCode) {
    super(message);
    this.name = 'KeyError';
    this.code = code;

    // Maintain proper stack trace for V8 (Node.js-specific)
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: unknown) => void;
    };
    if (ErrorWithCapture.captureStackTrace) {
      ErrorWithCapture.captureStackTrace(this, new.target);
    }
  }
}

/** Unrecognized curve identifier or algorithm name. */
export class UnsupportedCurveError extends KeyError {
  constructor(message = 'Unsupported curve') {
    super(message, 'UNSUPPORTED_CURVE');
    this.name = 'UnsupportedCurveError';
  }
}

/** Key material, group, blob or text that cannot be accepted. */
export class InvalidFormatError extends KeyError {
  constructor(message = 'Invalid key format') {
    super(message, 'INVALID_FORMAT');
    this.name = 'InvalidFormatError';
  }
}

/**
 * Signing or verification could not be carried out.
 * A signature that simply does not match is not a CryptoError.
 */
export class CryptoError extends KeyError {
  constructor(
    message: string,
    code: Extract<KeyErrorCode, 'SIGNING_FAILED' | 'SIGNATURE_MALFORMED' | 'VERIFICATION_FAILED'>
  ) {
    super(message, code);
    this.name = 'CryptoError';
  }
}

/** Blob serialization failed. */
export class EncodingError extends KeyError {
  constructor(message = 'Key encoding failed') {
    super(message, 'ENCODING_FAILED');
    this.name = 'EncodingError';
  }
}
