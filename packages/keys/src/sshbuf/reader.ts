/**
 * @sshkit/keys - SSH Buffer Reader
 *
 * Reads uint32 values and length-prefixed strings from SSH wire data.
 */

import { SSH_LENGTH_PREFIX_SIZE } from '../constants';
import { InvalidFormatError } from '../types';

const textDecoder = new TextDecoder('utf-8', { fatal: true });

export class SshReader {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  /** Bytes not yet consumed */
  get remaining(): number {
    return this.data.length - this.offset;
  }

  readUint32(): number {
    const bytes = this.take(SSH_LENGTH_PREFIX_SIZE);
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, false);
  }

  /**
   * Read a length-prefixed byte string. Returns a copy.
   */
  readString(): Uint8Array {
    const length = this.readUint32();
    return Uint8Array.from(this.take(length));
  }

  /**
   * Read a length-prefixed string and decode it as UTF-8.
   */
  readUtf8(): string {
    const bytes = this.readString();
    try {
      return textDecoder.decode(bytes);
    } catch {
      throw new InvalidFormatError('Invalid UTF-8 in SSH string');
    }
  }

  /**
   * @throws InvalidFormatError if any bytes are left
   */
  assertEnd(): void {
    if (this.remaining !== 0) {
      throw new InvalidFormatError('Unexpected trailing bytes');
    }
  }

  private take(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new InvalidFormatError('Truncated SSH data');
    }
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }
}
