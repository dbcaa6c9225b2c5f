/**
 * @sshkit/keys - Constants
 *
 * SSH algorithm names and curve parameters.
 */

/** SSH algorithm name for ECDSA over NIST P-256 */
export const NISTP256_ALGORITHM = 'ecdsa-sha2-nistp256';

/** SSH algorithm name for ECDSA over NIST P-384 */
export const NISTP384_ALGORITHM = 'ecdsa-sha2-nistp384';

/** SSH algorithm name for ECDSA over NIST P-521 */
export const NISTP521_ALGORITHM = 'ecdsa-sha2-nistp521';

/** Tag byte of an uncompressed SEC1 point */
export const UNCOMPRESSED_POINT_TAG = 0x04;

/** Size of the big-endian length prefix on SSH strings */
export const SSH_LENGTH_PREFIX_SIZE = 4;

/** Prefix of an OpenSSH SHA-256 fingerprint */
export const SHA256_FINGERPRINT_PREFIX = 'SHA256:';
