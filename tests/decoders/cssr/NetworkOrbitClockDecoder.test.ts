import { BitWriter } from '../../../src/BitWriter';
import { NetworkOrbitClockDecoder } from '../../../src/decoders/cssr';
import { buildMask, cursorOf, expectOk, GPS_THREE_BY_TWO } from '../../fixtures/payloads';

describe('NetworkOrbitClockDecoder', () => {
  const decoder = new NetworkOrbitClockDecoder();
  const mask = buildMask([GPS_THREE_BY_TWO]);

  it('reads orbit and clock for the network subset', () => {
    const w = new BitWriter()
      .writeFlags([true, true, true])
      .writeUnsigned(2, 5)
      .writeFlags([false, false, true])
      .writeUnsigned(200, 8)
      .writeSigned(-2, 15)
      .writeSigned(0, 13)
      .writeSigned(3, 13)
      .writeSigned(100, 15);
    const cursor = cursorOf(w);
    const body = expectOk(decoder.decode(cursor, mask));

    expect(cursor.offset).toBe(75);
    expect(body.records.map(r => r.kind)).toEqual(['orbit', 'clock']);
    expect(body.records[0]).toMatchObject({ satellite: 'G05', iode: 200, along: 0, networkId: 2 });
    expect(body.records[1]).toMatchObject({ satellite: 'G05', c0: 0.16, networkId: 2 });
    expect(body.trace).toBe(
      'ST11 Orb=on Clk=on Net=on\n' +
        'ST11 NID=2\n' +
        'ST11 G05 IODE= 200 d_radial=-0.0032m d_along= 0.0000m d_cross= 0.0192m c0=  0.160m\n',
    );
    expect(body.usage).toEqual({ satellite: 67, signal: 0, other: 8 });
  });

  it('carries no satellite data without the network flag', () => {
    const w = new BitWriter().writeFlags([true, true, false]);
    const cursor = cursorOf(w);
    const body = expectOk(decoder.decode(cursor, mask));
    expect(cursor.offset).toBe(3);
    expect(body.records).toEqual([]);
    expect(body.trace).toBe('ST11 Orb=on Clk=on Net=off\n');
  });

  it('reads the clock alone when the orbit flag is off', () => {
    const w = new BitWriter()
      .writeFlags([false, true, true])
      .writeUnsigned(0, 5)
      .writeFlags([true, false, false])
      .writeSigned(-16384, 15);
    const body = expectOk(decoder.decode(cursorOf(w), mask));
    expect(body.records).toEqual([{ kind: 'clock', satellite: 'G01', c0: null, networkId: 0 }]);
  });
});
