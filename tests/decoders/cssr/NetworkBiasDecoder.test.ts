import { BitWriter } from '../../../src/BitWriter';
import { NetworkBiasDecoder } from '../../../src/decoders/cssr';
import { buildMask, cursorOf, expectOk, GPS_ONE_CELL, GPS_THREE_BY_TWO } from '../../fixtures/payloads';

describe('NetworkBiasDecoder', () => {
  const decoder = new NetworkBiasDecoder();

  it('covers every satellite when no network is given', () => {
    const mask = buildMask([GPS_ONE_CELL]);
    const w = new BitWriter().writeFlags([true, false, false]).writeSigned(1, 11);
    const body = expectOk(decoder.decode(cursorOf(w), mask));

    expect(body.records).toEqual([
      { kind: 'code-bias', satellite: 'G01', signal: 'L1 C/A', bias: 0.02, networkId: undefined },
    ]);
    expect(body.trace).toBe(
      'ST6 code_bias=on phase_bias=off network_bias=off\n' + 'ST6 G01 L1 C/A        code_bias=  0.020m\n',
    );
    expect(body.usage).toEqual({ satellite: 0, signal: 11, other: 3 });
  });

  it('restricts cells to the network subset', () => {
    const mask = buildMask([GPS_THREE_BY_TWO]);
    const w = new BitWriter()
      .writeFlags([true, true, true])
      .writeUnsigned(7, 5)
      .writeFlags([false, true, false]);
    for (let i = 0; i < 2; i++) {
      w.writeSigned(-1, 11).writeSigned(5, 15).writeUnsigned(2, 2);
    }
    const cursor = cursorOf(w);
    const body = expectOk(decoder.decode(cursor, mask));

    expect(cursor.offset).toBe(3 + 5 + 3 + 2 * 28);
    expect(body.records.map(r => r.kind)).toEqual(['code-bias', 'phase-bias', 'code-bias', 'phase-bias']);
    expect(body.records.map(r => ('satellite' in r ? r.satellite : ''))).toEqual(['G03', 'G03', 'G03', 'G03']);
    expect(body.records[1]).toMatchObject({ networkId: 7, discontinuity: 2, unit: 'm' });
    expect(body.trace.split('\n').slice(0, 3)).toEqual([
      'ST6 code_bias=on phase_bias=on network_bias=on',
      'ST6 NID=7',
      'ST6 G03 L1 C/A        code_bias= -0.020m phase_bias=  0.005m discont_indi=2',
    ]);
    expect(body.usage).toEqual({ satellite: 0, signal: 64, other: 3 });
  });
});
