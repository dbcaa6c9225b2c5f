/**
 * @sshkit/keys - SSH Buffer Writer
 *
 * Builds SSH wire data: uint32 values and length-prefixed strings
 * (4-byte big-endian length followed by the raw bytes).
 */

import { SSH_LENGTH_PREFIX_SIZE } from '../constants';
import { concatBytes } from '../utils';

const textEncoder = new TextEncoder();

export class SshWriter {
  private readonly chunks: Uint8Array[] = [];

  /**
   * Append a big-endian uint32.
   */
  writeUint32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new RangeError('uint32 out of range');
    }
    const bytes = new Uint8Array(SSH_LENGTH_PREFIX_SIZE);
    new DataView(bytes.buffer).setUint32(0, value, false);
    this.chunks.push(bytes);
    return this;
  }

  /**
   * Append a length-prefixed byte string. The input is copied.
   */
  writeString(data: Uint8Array): this {
    this.writeUint32(data.length);
    this.chunks.push(Uint8Array.from(data));
    return this;
  }

  /**
   * Append a length-prefixed UTF-8 string.
   */
  writeUtf8(text: string): this {
    return this.writeString(textEncoder.encode(text));
  }

  toBytes(): Uint8Array {
    return concatBytes(...this.chunks);
  }
}
