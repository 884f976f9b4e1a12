import { BitWriter } from '../../../src/BitWriter';
import { GridDecoder, gridLabel } from '../../../src/decoders/cssr';
import { buildMask, cursorOf, expectOk, GPS_ONE_CELL } from '../../fixtures/payloads';

describe('GridDecoder', () => {
  const mask = buildMask([GPS_ONE_CELL]);

  it('labels grid points from 1', () => {
    expect(gridLabel(0, 2)).toBe('grid  1/ 2');
    expect(gridLabel(11, 12)).toBe('grid 12/12');
  });

  it('reads troposphere delays and short STEC residuals per grid point', () => {
    const w = new BitWriter()
      .writeUnsigned(0, 2)
      .writeBit(0)
      .writeUnsigned(1, 5)
      .writeFlags([true])
      .writeUnsigned(5, 6)
      .writeUnsigned(2, 6)
      .writeSigned(10, 9)
      .writeSigned(5, 8)
      .writeSigned(-3, 7)
      .writeSigned(-256, 9)
      .writeSigned(0, 8)
      .writeSigned(63, 7);
    const body = expectOk(new GridDecoder().decode(cursorOf(w), mask));

    expect(body.trace.split('\n')).toEqual([
      'ST9 Trop correct_type=0 NID=1 quality=5 ngrid=2',
      'ST9 Trop     grid  1/ 2 dry-delay= 0.040m wet-delay= 0.020m',
      'ST9 STEC G01 grid  1/ 2 residual=-0.120TECU (7bit)',
      'ST9 Trop     grid  2/ 2 dry-delay=   N/Am wet-delay= 0.000m',
      'ST9 STEC G01 grid  2/ 2 residual= 2.520TECU (7bit)',
      '',
    ]);
    expect(body.records).toHaveLength(1);
    expect(body.records[0]).toMatchObject({ kind: 'troposphere', networkId: 1, quality: 5, correctionType: 0 });
    expect(body.usage).toEqual({ satellite: 0, signal: 0, other: 69 });
  });

  it('switches to 16-bit residuals for the long range', () => {
    const w = new BitWriter()
      .writeUnsigned(0, 2)
      .writeBit(1)
      .writeUnsigned(0, 5)
      .writeFlags([true])
      .writeUnsigned(0, 6)
      .writeUnsigned(1, 6)
      .writeSigned(0, 9)
      .writeSigned(0, 8)
      .writeSigned(-32768, 16);
    const body = expectOk(new GridDecoder().decode(cursorOf(w), mask));
    const [record] = body.records;
    if (record.kind !== 'troposphere') throw new Error('expected a troposphere record');
    expect(record.grid[0].stecResiduals).toEqual([{ satellite: 'G01', residual: null }]);
    expect(body.trace.split('\n')[2]).toBe('ST9 STEC G01 grid  1/ 1 residual=   N/ATECU (16bit)');
  });
});
