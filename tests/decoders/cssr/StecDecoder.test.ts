import { BitWriter } from '../../../src/BitWriter';
import { StecDecoder } from '../../../src/decoders/cssr';
import { buildMask, cursorOf, expectOk, GPS_ONE_CELL, GPS_THREE_BY_TWO } from '../../fixtures/payloads';

describe('StecDecoder', () => {
  const mask = buildMask([GPS_THREE_BY_TWO]);

  function payload(): BitWriter {
    return new BitWriter()
      .writeUnsigned(1, 2)
      .writeUnsigned(3, 5)
      .writeFlags([true, false, true])
      .writeUnsigned(10, 6)
      .writeSigned(20, 14)
      .writeSigned(-5, 12)
      .writeSigned(0, 12)
      .writeUnsigned(63, 6)
      .writeSigned(-8192, 14)
      .writeSigned(1, 12)
      .writeSigned(2, 12);
  }

  it('reads the polynomial terms of the correction type for subset satellites', () => {
    const cursor = cursorOf(payload());
    const body = expectOk(new StecDecoder().decode(cursor, mask));

    expect(cursor.offset).toBe(2 + 5 + 3 + 2 * (6 + 14 + 12 + 12));
    expect(body.records.map(r => ('satellite' in r ? r.satellite : ''))).toEqual(['G01', 'G05']);
    expect(body.records[0]).toMatchObject({ kind: 'stec', networkId: 3, quality: 10, correctionType: 1 });
    expect(body.records[1]).toMatchObject({ quality: 63, polynomial: { c00: null } });
    expect(body.trace).toBe(
      'ST8 G01 c00= 1.000TECU c01=-0.100TECU/deg c10= 0.000TECU/deg\n' +
        'ST8 G05 c00=   N/ATECU c01= 0.020TECU/deg c10= 0.040TECU/deg\n',
    );
    expect(body.usage).toEqual({ satellite: 91, signal: 0, other: 7 });
  });

  it('reads c00 only for correction type 0', () => {
    const w = new BitWriter()
      .writeUnsigned(0, 2)
      .writeUnsigned(0, 5)
      .writeFlags([false, true, false])
      .writeUnsigned(1, 6)
      .writeSigned(-20, 14);
    const body = expectOk(new StecDecoder().decode(cursorOf(w), mask));
    expect(body.records[0]).toMatchObject({ satellite: 'G03', polynomial: { c00: -1 } });
    expect(body.trace).toBe('ST8 G03 c00=-1.000TECU\n');
  });

  it('reports a mask listing one system twice as a sequencing error', () => {
    const twice = buildMask([GPS_ONE_CELL, GPS_ONE_CELL]);
    const w = new BitWriter().writeUnsigned(0, 2).writeUnsigned(1, 5).writeFlags([true, true]);
    expect(new StecDecoder().decode(cursorOf(w), twice)).toEqual({
      status: 'sequencing-error',
      message: 'mask lists G more than once',
    });
  });
});
