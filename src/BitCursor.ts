import { InsufficientDataError } from './errors';

/** Largest width that still decodes exactly into a JS number. */
export const MAX_READ_WIDTH = 53;

/**
 * Read-only bit cursor over a message payload.
 * Bits are taken MSB-first within each byte (big-endian bit order), which is
 * how RTCM3 and the L6/E6 correction streams pack their fields.
 */
export class BitCursor {
  private readonly _data: Uint8Array;
  private readonly _bitLength: number;
  private _offset: number;

  private constructor(data: Uint8Array, bitLength: number, offset: number) {
    this._data = data;
    this._bitLength = bitLength;
    this._offset = offset;
  }

  /**
   * Wrap a payload for reading.
   * @param bitLength  number of valid bits; defaults to `data.length * 8`
   */
  static from(data: Uint8Array, bitLength?: number): BitCursor {
    const bl = bitLength ?? data.length * 8;
    if (bl < 0 || bl > data.length * 8) {
      throw new RangeError(`BitCursor: bitLength ${bl} out of range [0, ${data.length * 8}]`);
    }
    return new BitCursor(data, bl, 0);
  }

  /** Parse a binary string ('0' and '1' characters, whitespace ignored). */
  static fromBinaryString(bits: string): BitCursor {
    const clean = bits.replace(/\s+/g, '');
    const data = new Uint8Array(Math.ceil(clean.length / 8));
    for (let i = 0; i < clean.length; i++) {
      const ch = clean[i];
      if (ch !== '0' && ch !== '1') {
        throw new Error(`Invalid binary character: '${ch}'`);
      }
      if (ch === '1') data[i >> 3] |= 0x80 >> (i & 7);
    }
    return new BitCursor(data, clean.length, 0);
  }

  /** Parse a hex string (whitespace ignored). */
  static fromHex(hex: string): BitCursor {
    return BitCursor.from(hexToBytes(hex));
  }

  /** Total number of valid bits. */
  get bitLength(): number {
    return this._bitLength;
  }

  /** Current cursor position in bits. */
  get offset(): number {
    return this._offset;
  }

  /** Bits remaining from cursor to end. */
  get remaining(): number {
    return this._bitLength - this._offset;
  }

  hasAtLeast(count: number): boolean {
    return count <= this.remaining;
  }

  /**
   * Check a whole block up front, before its first field is read.
   * Throws {@link InsufficientDataError} reporting the block size.
   */
  require(count: number): void {
    this.ensure(count);
  }

  /** Independent cursor over the same bytes, positioned where this one is. */
  clone(): BitCursor {
    return new BitCursor(this._data, this._bitLength, this._offset);
  }

  /** Seek to absolute bit offset. */
  seek(bitOffset: number): void {
    if (bitOffset < 0 || bitOffset > this._bitLength) {
      throw new RangeError(`seek: offset ${bitOffset} out of range [0, ${this._bitLength}]`);
    }
    this._offset = bitOffset;
  }

  skip(count: number): void {
    this.ensure(count);
    this._offset += count;
  }

  /** True when every bit from the cursor to the end is zero. */
  isZero(): boolean {
    for (let pos = this._offset; pos < this._bitLength; pos++) {
      if (this.bitAt(pos)) return false;
    }
    return true;
  }

  /** Read a single bit. */
  readBit(): 0 | 1 {
    this.ensure(1);
    return this.bitAt(this._offset++);
  }

  /**
   * Read `count` bits as an unsigned integer.
   * @param count  0..53
   */
  readUnsigned(count: number): number {
    checkWidth(count, 0);
    this.ensure(count);
    let result = 0;
    for (let i = 0; i < count; i++) {
      result = result * 2 + this.bitAt(this._offset++);
    }
    return result;
  }

  /** Read a `count`-bit two's-complement integer (1..53 bits). */
  readSigned(count: number): number {
    checkWidth(count, 1);
    const raw = this.readUnsigned(count);
    const half = 2 ** (count - 1);
    return raw >= half ? raw - 2 * half : raw;
  }

  /**
   * Read a sign-magnitude integer: one sign bit followed by `count - 1`
   * magnitude bits. A set sign bit negates the magnitude; negative zero
   * reads as 0.
   */
  readSignMagnitude(count: number): number {
    checkWidth(count, 1);
    this.ensure(count);
    const sign = this.readBit();
    const magnitude = this.readUnsigned(count - 1);
    return sign && magnitude !== 0 ? -magnitude : magnitude;
  }

  /** Read a `count`-bit mask, first bit first. */
  readFlags(count: number): boolean[] {
    this.ensure(count);
    const flags: boolean[] = [];
    for (let i = 0; i < count; i++) {
      flags.push(this.bitAt(this._offset++) === 1);
    }
    return flags;
  }

  /**
   * Read `bitCount` bits as bytes. Bits are left-aligned in the first byte;
   * trailing bits in the last byte are zero-padded.
   */
  readBytes(bitCount: number): Uint8Array {
    this.ensure(bitCount);
    const result = new Uint8Array(Math.ceil(bitCount / 8));
    for (let i = 0; i < bitCount; i++) {
      if (this.bitAt(this._offset++)) result[i >> 3] |= 0x80 >> (i & 7);
    }
    return result;
  }

  private bitAt(pos: number): 0 | 1 {
    return ((this._data[pos >> 3] >> (7 - (pos & 7))) & 1) === 1 ? 1 : 0;
  }

  private ensure(count: number): void {
    if (count > this.remaining) {
      throw new InsufficientDataError(this._offset, count, this.remaining);
    }
  }
}

function checkWidth(count: number, min: number): void {
  if (!Number.isInteger(count) || count < min || count > MAX_READ_WIDTH) {
    throw new RangeError(`bit width must be ${min}..${MAX_READ_WIDTH}, got ${count}`);
  }
}

/** Convert a hex string to bytes. Whitespace is ignored. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '').toLowerCase();
  if (!/^[0-9a-f]*$/.test(clean)) throw new Error('Invalid hex characters');
  if (clean.length % 2 !== 0) throw new Error('Hex string must have even length');
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
