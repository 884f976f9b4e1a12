/**
 * Growable MSB-first bit writer. Produces payloads in the same bit order
 * {@link BitCursor} reads, for synthetic messages and fixtures.
 */
export class BitWriter {
  private _data: Uint8Array;
  private _bitLength: number;

  constructor(initialByteCapacity = 64) {
    this._data = new Uint8Array(Math.max(1, initialByteCapacity));
    this._bitLength = 0;
  }

  /** Number of bits written so far. */
  get bitLength(): number {
    return this._bitLength;
  }

  /** Write a single bit. */
  writeBit(bit: 0 | 1 | boolean): this {
    this.ensureCapacity(this._bitLength + 1);
    if (bit) {
      this._data[this._bitLength >> 3] |= 0x80 >> (this._bitLength & 7);
    }
    this._bitLength++;
    return this;
  }

  /**
   * Write `value` as a `count`-bit unsigned integer (MSB first).
   * @param count  0..53
   */
  writeUnsigned(value: number, count: number): this {
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** count) {
      throw new RangeError(`writeUnsigned: ${value} does not fit in ${count} bits`);
    }
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit(Math.floor(value / 2 ** i) % 2 === 1);
    }
    return this;
  }

  /** Write `value` as a `count`-bit two's-complement integer. */
  writeSigned(value: number, count: number): this {
    const half = 2 ** (count - 1);
    if (!Number.isInteger(value) || value < -half || value >= half) {
      throw new RangeError(`writeSigned: ${value} does not fit in ${count} bits`);
    }
    return this.writeUnsigned(value < 0 ? value + 2 * half : value, count);
  }

  /** Write a sign bit followed by `count - 1` magnitude bits. */
  writeSignMagnitude(value: number, count: number): this {
    this.writeBit(value < 0);
    return this.writeUnsigned(Math.abs(value), count - 1);
  }

  /** Write a mask of `count` bits with the given 0-based positions set. */
  writeMask(positions: readonly number[], count: number): this {
    const set = new Set(positions);
    for (let i = 0; i < count; i++) {
      this.writeBit(set.has(i));
    }
    return this;
  }

  /** Write each flag as one bit. */
  writeFlags(flags: readonly boolean[]): this {
    for (const flag of flags) this.writeBit(flag);
    return this;
  }

  /** Write `bitCount` left-aligned bits taken from `data`. */
  writeBytes(data: Uint8Array, bitCount = data.length * 8): this {
    for (let i = 0; i < bitCount; i++) {
      this.writeBit(((data[i >> 3] >> (7 - (i & 7))) & 1) === 1);
    }
    return this;
  }

  /** Return compact Uint8Array with trailing bits zero-padded. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, Math.ceil(this._bitLength / 8));
  }

  /** Return hex string representation. */
  toHex(): string {
    return Array.from(this.toUint8Array()).map(b => b.toString(16).padStart(2, '0')).join('');
  }

  private ensureCapacity(bitsNeeded: number): void {
    const bytesNeeded = Math.ceil(bitsNeeded / 8);
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data);
    this._data = newData;
  }
}
