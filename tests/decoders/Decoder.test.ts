import { BitWriter } from '../../src/BitWriter';
import { fullSubsetMasks, isSelected, readSubsetMasks } from '../../src/decoders/Decoder';
import { SequencingError } from '../../src/errors';
import { GPS_ONE_CELL, GPS_THREE_BY_TWO, buildMask, cursorOf } from '../fixtures/payloads';

describe('subset masks', () => {
  it('reads one flag per mask satellite, system by system', () => {
    const mask = buildMask([GPS_THREE_BY_TWO, { gnssId: 2, satellites: [4], signals: [0] }]);
    const cursor = cursorOf(new BitWriter().writeFlags([true, false, true, false]));
    const masks = readSubsetMasks(cursor, mask);

    expect(cursor.offset).toBe(4);
    expect(masks.get('G')).toEqual([true, false, true]);
    expect(masks.get('E')).toEqual([false]);
    expect([...mask.satellites()].filter(ref => isSelected(masks, ref)).map(ref => ref.satellite)).toEqual([
      'G01',
      'G05',
    ]);
  });

  it('selects every satellite by default', () => {
    expect(fullSubsetMasks(buildMask([GPS_THREE_BY_TWO])).get('G')).toEqual([true, true, true]);
  });

  it('rejects a mask that lists the same system twice', () => {
    const mask = buildMask([GPS_ONE_CELL, GPS_ONE_CELL]);
    const cursor = cursorOf(new BitWriter().writeFlags([true, true]));
    expect(() => readSubsetMasks(cursor, mask)).toThrow(new SequencingError('mask lists G more than once'));
    expect(() => fullSubsetMasks(mask)).toThrow(SequencingError);
  });
});
