import type { BitCursor } from '../../BitCursor';
import { FIELDS, type ScaledField, readScaled } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { CodeBiasCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import {
  MaskedDecoder,
  formatValidityInterval,
  readValidityInterval,
  usageOf,
} from '../Decoder';

export interface CodeBiasDecoderOptions {
  label: string;
  /** Defaults to the 11-bit, 0.02 m CSSR code bias. */
  field?: ScaledField;
  validityInterval?: boolean;
}

/** Code bias per active cell (CSSR subtype 4, HAS code bias block). */
export class CodeBiasDecoder extends MaskedDecoder {
  readonly label: string;
  private readonly field: ScaledField;
  private readonly validityInterval: boolean;

  constructor(options: CodeBiasDecoderOptions) {
    super();
    this.label = options.label;
    this.field = options.field ?? FIELDS.cssrCodeBias;
    this.validityInterval = options.validityInterval ?? false;
  }

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    let trace = '';
    if (this.validityInterval) {
      trace += formatValidityInterval(this.label, readValidityInterval(cursor)) + '\n';
    }
    const other = cursor.offset - start;
    cursor.require(this.field.width * mask.activeCellCount);
    const records: CodeBiasCorrection[] = [];
    for (const { satellite, signal } of mask.cells()) {
      const bias = readScaled(cursor, this.field);
      records.push({ kind: 'code-bias', satellite, signal, bias });
      trace += `${this.label} ${satellite} ${signal.padEnd(13)} code_bias=${formatFixed(bias, 7, 3)}m\n`;
    }
    return { records, trace, usage: usageOf('signal', cursor.offset - start, other) };
  }
}

export const cssrCodeBiasDecoder = new CodeBiasDecoder({ label: 'ST4' });
