import type { BitCursor } from '../../BitCursor';
import { FIELDS, type ScaledField, readScaled } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { PhaseBiasCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import {
  MaskedDecoder,
  formatValidityInterval,
  readValidityInterval,
  usageOf,
} from '../Decoder';

export interface PhaseBiasDecoderOptions {
  label: string;
  field: ScaledField;
  unit: 'm' | 'cycle';
  validityInterval?: boolean;
}

/**
 * Phase bias and 2-bit discontinuity indicator per active cell
 * (CSSR subtype 5 in metres, HAS phase bias block in cycles).
 */
export class PhaseBiasDecoder extends MaskedDecoder {
  readonly label: string;
  private readonly options: PhaseBiasDecoderOptions;

  constructor(options: PhaseBiasDecoderOptions) {
    super();
    this.label = options.label;
    this.options = options;
  }

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const { field, unit } = this.options;
    const start = cursor.offset;
    let trace = '';
    if (this.options.validityInterval) {
      trace += formatValidityInterval(this.label, readValidityInterval(cursor)) + '\n';
    }
    const other = cursor.offset - start;
    const records: PhaseBiasCorrection[] = [];
    for (const { satellite, signal } of mask.cells()) {
      cursor.require(field.width + 2);
      const bias = readScaled(cursor, field);
      const discontinuity = cursor.readUnsigned(2);
      records.push({ kind: 'phase-bias', satellite, signal, bias, unit, discontinuity });
      trace +=
        `${this.label} ${satellite} ${signal.padEnd(13)}` +
        ` phase_bias=${formatFixed(bias, 7, 3)}${unit}` +
        ` discont_indicator=${discontinuity}\n`;
    }
    return { records, trace, usage: usageOf('signal', cursor.offset - start, other) };
  }
}

export const cssrPhaseBiasDecoder = new PhaseBiasDecoder({
  label: 'ST5',
  field: FIELDS.cssrPhaseBias,
  unit: 'm',
});
