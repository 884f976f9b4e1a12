import { BitCursor, hexToBytes } from '../src/BitCursor';
import { BitWriter } from '../src/BitWriter';
import { InsufficientDataError } from '../src/errors';

describe('BitCursor', () => {
  describe('construction', () => {
    it('covers every bit of the buffer by default', () => {
      const cursor = BitCursor.from(new Uint8Array([0xff, 0x00]));
      expect(cursor.bitLength).toBe(16);
      expect(cursor.offset).toBe(0);
      expect(cursor.remaining).toBe(16);
    });

    it('limits reads to an explicit bit length', () => {
      const cursor = BitCursor.from(new Uint8Array([0xff]), 5);
      expect(cursor.readUnsigned(5)).toBe(31);
      expect(cursor.hasAtLeast(1)).toBe(false);
    });

    it('rejects a bit length beyond the buffer', () => {
      expect(() => BitCursor.from(new Uint8Array(1), 9)).toThrow(RangeError);
    });

    it('parses binary strings and hex', () => {
      expect(BitCursor.fromBinaryString('1010 0101').readUnsigned(8)).toBe(0xa5);
      expect(BitCursor.fromHex('a5').readUnsigned(8)).toBe(0xa5);
      expect(() => BitCursor.fromBinaryString('102')).toThrow("Invalid binary character: '2'");
    });
  });

  describe('unsigned reads', () => {
    it('reads MSB first across byte boundaries', () => {
      const cursor = BitCursor.from(new Uint8Array([0b10110011, 0xff]));
      expect(cursor.readUnsigned(3)).toBe(0b101);
      expect(cursor.readBit()).toBe(1);
      expect(cursor.readUnsigned(4)).toBe(0b0011);
      expect(cursor.readUnsigned(8)).toBe(0xff);
      expect(cursor.remaining).toBe(0);
    });

    it('reads 0 bits as 0 without moving', () => {
      const cursor = BitCursor.from(new Uint8Array([0xff]));
      expect(cursor.readUnsigned(0)).toBe(0);
      expect(cursor.offset).toBe(0);
    });

    it('reads up to 53 bits exactly', () => {
      const w = new BitWriter().writeUnsigned(2 ** 53 - 1, 53);
      expect(BitCursor.from(w.toUint8Array()).readUnsigned(53)).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('rejects widths above 53', () => {
      const cursor = BitCursor.from(new Uint8Array(8));
      expect(() => cursor.readUnsigned(54)).toThrow(RangeError);
    });
  });

  describe('signed reads', () => {
    it('decodes two\'s complement', () => {
      expect(BitCursor.fromBinaryString('1111').readSigned(4)).toBe(-1);
      expect(BitCursor.fromBinaryString('1000').readSigned(4)).toBe(-8);
      expect(BitCursor.fromBinaryString('0111').readSigned(4)).toBe(7);
    });

    it('decodes sign-magnitude with the sign bit counted in the width', () => {
      expect(BitCursor.fromBinaryString('1011').readSignMagnitude(4)).toBe(-3);
      expect(BitCursor.fromBinaryString('0011').readSignMagnitude(4)).toBe(3);
    });

    it('reads a set sign bit with zero magnitude as positive zero', () => {
      expect(Object.is(BitCursor.fromBinaryString('1000').readSignMagnitude(4), 0)).toBe(true);
    });

    it('agrees with a BigInt reference for both encodings', () => {
      let seed = 0x2545f491;
      const next = (): number => {
        seed ^= seed << 13;
        seed ^= seed >>> 17;
        seed ^= seed << 5;
        return seed >>> 0;
      };
      for (let width = 2; width <= 32; width++) {
        for (let i = 0; i < 20; i++) {
          const raw = width === 32 ? next() : next() % 2 ** width;
          const bytes = new BitWriter().writeUnsigned(raw, width).toUint8Array();

          const twos = Number(BigInt.asIntN(width, BigInt(raw)));
          expect(BitCursor.from(bytes, width).readSigned(width)).toBe(twos);

          const magnitude = Number(BigInt(raw) & ((1n << BigInt(width - 1)) - 1n));
          const negative = BigInt(raw) >> BigInt(width - 1) === 1n;
          const signMagnitude = BitCursor.from(bytes, width).readSignMagnitude(width);
          expect(signMagnitude).toBe(negative && magnitude !== 0 ? -magnitude : magnitude);
        }
      }
    });
  });

  describe('running out of data', () => {
    it('throws InsufficientDataError with the position and counts', () => {
      const cursor = BitCursor.fromBinaryString('101');
      cursor.readBit();
      let caught: unknown;
      try {
        cursor.readUnsigned(4);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InsufficientDataError);
      expect(caught).toMatchObject({ bitOffset: 1, needed: 4, available: 2 });
    });

    it('checks a whole block without moving', () => {
      const cursor = BitCursor.from(new Uint8Array(2));
      expect(() => cursor.require(16)).not.toThrow();
      expect(() => cursor.require(17)).toThrow(InsufficientDataError);
      expect(cursor.offset).toBe(0);
    });

    it('does not move when a read fails', () => {
      const cursor = BitCursor.fromBinaryString('10');
      expect(() => cursor.readSignMagnitude(3)).toThrow(InsufficientDataError);
      expect(cursor.offset).toBe(0);
    });
  });

  describe('positioning', () => {
    it('clones an independent cursor', () => {
      const cursor = BitCursor.from(new Uint8Array([0xf0]));
      cursor.skip(2);
      const copy = cursor.clone();
      expect(copy.readUnsigned(2)).toBe(0b11);
      expect(cursor.offset).toBe(2);
      expect(copy.offset).toBe(4);
    });

    it('seeks within range only', () => {
      const cursor = BitCursor.from(new Uint8Array([0x0f]));
      cursor.seek(4);
      expect(cursor.readUnsigned(4)).toBe(0xf);
      expect(() => cursor.seek(9)).toThrow(RangeError);
    });

    it('detects all-zero remainders', () => {
      const cursor = BitCursor.from(new Uint8Array([0x80, 0x00]));
      expect(cursor.isZero()).toBe(false);
      cursor.skip(1);
      expect(cursor.isZero()).toBe(true);
    });
  });

  describe('bulk reads', () => {
    it('reads flags in order', () => {
      expect(BitCursor.fromBinaryString('101').readFlags(3)).toEqual([true, false, true]);
    });

    it('reads left-aligned bytes and zero-pads the tail', () => {
      const cursor = BitCursor.from(new Uint8Array([0xab, 0xcd]));
      expect(Array.from(cursor.readBytes(12))).toEqual([0xab, 0xc0]);
    });
  });
});

describe('hexToBytes', () => {
  it('ignores whitespace and case', () => {
    expect(Array.from(hexToBytes('DE ad'))).toEqual([0xde, 0xad]);
  });

  it('rejects odd lengths and foreign characters', () => {
    expect(() => hexToBytes('abc')).toThrow('Hex string must have even length');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex characters');
  });
});
