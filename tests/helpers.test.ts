import { bytesToHex, formatFixed, formatHex, formatInt, formatZeroPadded, setPositions } from '../src/helpers';

describe('helpers', () => {
  describe('formatFixed', () => {
    it('pads to the field width', () => {
      expect(formatFixed(0.0016, 7, 4)).toBe(' 0.0016');
      expect(formatFixed(-1.5, 7, 3)).toBe(' -1.500');
    });

    it('renders invalid values as right-aligned N/A', () => {
      expect(formatFixed(null, 7, 4)).toBe('    N/A');
    });

    it('renders zero as a number, not N/A', () => {
      expect(formatFixed(0, 6, 3)).toBe(' 0.000');
    });

    it('never truncates a wider value', () => {
      expect(formatFixed(12345.678, 6, 3)).toBe('12345.678');
    });
  });

  describe('integer formats', () => {
    it('right-aligns decimals', () => {
      expect(formatInt(5, 4)).toBe('   5');
    });

    it('zero-pads decimals', () => {
      expect(formatZeroPadded(7, 2)).toBe('07');
      expect(formatZeroPadded(123, 2)).toBe('123');
    });

    it('zero-pads lower-case hex', () => {
      expect(formatHex(10)).toBe('0a');
      expect(formatHex(0x3f, 4)).toBe('003f');
    });
  });

  describe('setPositions', () => {
    it('lists set flags from the given base', () => {
      expect(setPositions([true, false, true])).toEqual([0, 2]);
      expect(setPositions([true, false, true], 1)).toEqual([1, 3]);
      expect(setPositions([])).toEqual([]);
    });
  });

  describe('bytesToHex', () => {
    it('joins two digits per byte', () => {
      expect(bytesToHex(new Uint8Array([0x00, 0x0f, 0xa0]))).toBe('000fa0');
    });
  });
});
