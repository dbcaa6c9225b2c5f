/**
 * @sshkit/keys - Utilities
 *
 * Re-exports for encoding and memory utilities.
 */

export { hexToBytes, bytesToHex, concatBytes, bytesToBase64, base64ToBytes } from './encoding';
export { clearBytes } from './memory';
