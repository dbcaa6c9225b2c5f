/**
 * @sshkit/keys - Memory Utilities
 *
 * Best-effort clearing of private scalars held in temporary buffers.
 *
 * JavaScript does not guarantee memory clearing: the garbage collector owns
 * deallocation and V8 may keep copies. Overwriting is all we can do.
 */

/**
 * Overwrite a buffer with zeros (null-safe).
 */
export function clearBytes(data: Uint8Array | null): void {
  if (data) {
    data.fill(0);
  }
}
