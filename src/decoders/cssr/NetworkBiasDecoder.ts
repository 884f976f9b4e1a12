import type { BitCursor } from '../../BitCursor';
import { FIELDS, readScaled } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { CorrectionRecord } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import {
  MaskedDecoder,
  fullSubsetMasks,
  isSelected,
  readSubsetMasks,
  usageOf,
} from '../Decoder';

const onOff = (flag: boolean): string => (flag ? 'on' : 'off');

/**
 * CSSR subtype 6: code and/or phase bias per active cell, optionally
 * restricted to the satellites of one network.
 */
export class NetworkBiasDecoder extends MaskedDecoder {
  readonly label = 'ST6';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    const [hasCode, hasPhase, hasNetwork] = cursor.readFlags(3);
    let trace =
      `${this.label} code_bias=${onOff(hasCode)}` +
      ` phase_bias=${onOff(hasPhase)}` +
      ` network_bias=${onOff(hasNetwork)}\n`;

    let networkId: number | undefined;
    let subset = fullSubsetMasks(mask);
    if (hasNetwork) {
      networkId = cursor.readUnsigned(5);
      trace += `${this.label} NID=${networkId}\n`;
      subset = readSubsetMasks(cursor, mask);
    }

    const records: CorrectionRecord[] = [];
    for (const cell of mask.cells()) {
      if (!isSelected(subset, cell)) continue;
      const { satellite, signal } = cell;
      trace += `${this.label} ${satellite} ${signal.padEnd(13)}`;
      if (hasCode) {
        const bias = readScaled(cursor, FIELDS.cssrCodeBias);
        records.push({ kind: 'code-bias', satellite, signal, bias, networkId });
        trace += ` code_bias=${formatFixed(bias, 7, 3)}m`;
      }
      if (hasPhase) {
        cursor.require(FIELDS.cssrPhaseBias.width + 2);
        const bias = readScaled(cursor, FIELDS.cssrPhaseBias);
        const discontinuity = cursor.readUnsigned(2);
        records.push({
          kind: 'phase-bias',
          satellite,
          signal,
          bias,
          unit: 'm',
          discontinuity,
          networkId,
        });
        trace += ` phase_bias=${formatFixed(bias, 7, 3)}m discont_indi=${discontinuity}`;
      }
      trace += '\n';
    }
    return { records, trace, usage: usageOf('signal', cursor.offset - start, 3) };
  }
}
