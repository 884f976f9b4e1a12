import { BitCursor } from '../../src/BitCursor';
import { BitWriter } from '../../src/BitWriter';
import { UnknownEnumerationError } from '../../src/errors';
import {
  FIELDS,
  STEC_RESIDUAL_BY_SIZE,
  gnssIdToSatsys,
  readScaled,
  satelliteName,
  scaleRaw,
  sentinelOf,
  signalName,
  uraMeters,
  validityIntervalSeconds,
} from '../../src/fields/FieldCodec';
import { INVALID } from '../../src/types';

describe('FieldCodec', () => {
  describe('sentinels', () => {
    it.each(Object.entries(FIELDS))('%s reserves only its most-negative value', (_name, field) => {
      const sentinel = sentinelOf(field);
      expect(sentinel).toBe(-(2 ** (field.width - 1)));
      expect(scaleRaw(sentinel, field)).toBe(INVALID);
      expect(scaleRaw(sentinel + 1, field)).toBeCloseTo((sentinel + 1) * field.scale, 9);
      expect(scaleRaw(2 ** (field.width - 1) - 1, field)).not.toBeNull();
      expect(scaleRaw(0, field)).toBe(0);
    });

    it('reads the sentinel off the wire as INVALID', () => {
      const field = FIELDS.cssrOrbitRadial;
      const w = new BitWriter().writeSigned(sentinelOf(field), field.width).writeSigned(1, field.width);
      const cursor = BitCursor.from(w.toUint8Array(), w.bitLength);
      expect(readScaled(cursor, field)).toBeNull();
      expect(readScaled(cursor, field)).toBeCloseTo(0.0016, 10);
    });

    it('maps the residual size to widths 4, 4, 5 and 7', () => {
      expect(STEC_RESIDUAL_BY_SIZE.map(f => f.width)).toEqual([4, 4, 5, 7]);
    });
  });

  describe('gnssIdToSatsys', () => {
    it('maps ids 0 to 5', () => {
      expect([0, 1, 2, 3, 4, 5].map(gnssIdToSatsys)).toEqual(['G', 'R', 'E', 'C', 'J', 'S']);
    });

    it('throws UnknownEnumerationError for reserved ids', () => {
      expect(() => gnssIdToSatsys(6)).toThrow(UnknownEnumerationError);
      expect(() => gnssIdToSatsys(15)).toThrow('unknown GNSS id: 15');
    });
  });

  describe('signalName', () => {
    it('names signal mask positions per system', () => {
      expect(signalName('G', 0)).toBe('L1 C/A');
      expect(signalName('G', 2)).toBe('L1 Z-tracking');
      expect(signalName('E', 12)).toBe('E6 B');
      expect(signalName('S', 1)).toBe('L5 I');
    });

    it('gives an empty name for reserved positions', () => {
      expect(signalName('G', 14)).toBe('');
    });

    it('throws for a system without a signal table', () => {
      expect(() => signalName('I', 0)).toThrow(UnknownEnumerationError);
    });
  });

  it('formats satellite names with two digits', () => {
    expect(satelliteName('E', 5)).toBe('E05');
    expect(satelliteName('C', 40)).toBe('C40');
  });

  describe('validityIntervalSeconds', () => {
    it('follows the interval table', () => {
      expect(validityIntervalSeconds(0)).toBe(5);
      expect(validityIntervalSeconds(5)).toBe(60);
      expect(validityIntervalSeconds(14)).toBe(3600);
    });

    it('treats index 15 as not applicable', () => {
      expect(validityIntervalSeconds(15)).toBe(0);
    });

    it('throws for indices outside the table', () => {
      expect(() => validityIntervalSeconds(16)).toThrow(UnknownEnumerationError);
      expect(() => validityIntervalSeconds(-1)).toThrow(UnknownEnumerationError);
    });
  });

  describe('uraMeters', () => {
    it('is undefined for index 0', () => {
      expect(uraMeters(0)).toBeNull();
    });

    it('combines class and value', () => {
      expect(uraMeters(1)).toBeCloseTo(0.00025, 12);
      expect(uraMeters(9)).toBeCloseTo(0.00275, 12);
      expect(uraMeters(63)).toBeCloseTo((3 ** 7 * 2.75 - 1) / 1000, 9);
    });
  });
});
