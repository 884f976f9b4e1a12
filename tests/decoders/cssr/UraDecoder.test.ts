import { BitWriter } from '../../../src/BitWriter';
import { UraDecoder } from '../../../src/decoders/cssr';
import { buildMask, cursorOf, expectOk } from '../../fixtures/payloads';

describe('UraDecoder', () => {
  it('reads a 6-bit URA index per satellite', () => {
    const mask = buildMask([{ gnssId: 0, satellites: [1, 3], signals: [0] }]);
    const w = new BitWriter().writeUnsigned(8, 6).writeUnsigned(0, 6);
    const body = expectOk(new UraDecoder().decode(cursorOf(w), mask));

    expect(body.records).toEqual([
      { kind: 'ura', satellite: 'G01', raw: 8, meters: 0.002 },
      { kind: 'ura', satellite: 'G03', raw: 0, meters: null },
    ]);
    expect(body.trace).toBe('ST7 G01 URA 8  0.0020m\n' + 'ST7 G03 URA 0     N/Am\n');
    expect(body.usage).toEqual({ satellite: 12, signal: 0, other: 0 });
  });
});
