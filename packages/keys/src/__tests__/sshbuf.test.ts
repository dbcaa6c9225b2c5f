/**
 * @sshkit/keys - SSH Buffer Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { SshReader, SshWriter } from '../sshbuf';
import { InvalidFormatError } from '../types';
import { bytesToHex, hexToBytes } from '../utils';

describe('SshWriter', () => {
  it('writes big-endian uint32 values', () => {
    expect(bytesToHex(new SshWriter().writeUint32(0x01020304).toBytes())).toBe('01020304');
  });

  it('length-prefixes strings', () => {
    const bytes = new SshWriter().writeUtf8('ab').writeString(Uint8Array.of(0xff)).toBytes();
    expect(bytesToHex(bytes)).toBe('00000002616200000001ff');
  });

  it('writes an empty string as a zero length', () => {
    expect(bytesToHex(new SshWriter().writeUtf8('').toBytes())).toBe('00000000');
  });

  it('rejects values outside uint32', () => {
    expect(() => new SshWriter().writeUint32(-1)).toThrow(RangeError);
    expect(() => new SshWriter().writeUint32(0x100000000)).toThrow(RangeError);
  });
});

describe('SshReader', () => {
  it('reads what the writer wrote', () => {
    const reader = new SshReader(hexToBytes('00000002616200000001ff0000002a'));

    expect(reader.readUtf8()).toBe('ab');
    expect(bytesToHex(reader.readString())).toBe('ff');
    expect(reader.readUint32()).toBe(42);
    expect(reader.remaining).toBe(0);
    expect(() => reader.assertEnd()).not.toThrow();
  });

  it('reads from a view into a larger buffer', () => {
    const backing = hexToBytes('ee0000000161ee');
    const reader = new SshReader(backing.subarray(1, 6));

    expect(reader.readUtf8()).toBe('a');
  });

  it('rejects a length beyond the data', () => {
    const reader = new SshReader(hexToBytes('0000000561'));
    expect(() => reader.readString()).toThrow(InvalidFormatError);
  });

  it('rejects a short length prefix', () => {
    expect(() => new SshReader(hexToBytes('000000')).readUint32()).toThrow(InvalidFormatError);
  });

  it('rejects invalid UTF-8', () => {
    expect(() => new SshReader(hexToBytes('00000001ff')).readUtf8()).toThrow(InvalidFormatError);
  });

  it('reports trailing bytes', () => {
    const reader = new SshReader(hexToBytes('0000000001'));
    reader.readString();
    expect(() => reader.assertEnd()).toThrow(InvalidFormatError);
  });
});
