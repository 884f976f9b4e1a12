import type { BitCursor } from '../../BitCursor';
import { FIELDS, readScaled } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { ClockCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, usageOf } from '../Decoder';

/** CSSR subtype 3: one clock correction per mask satellite. */
export class ClockDecoder extends MaskedDecoder {
  readonly label = 'ST3';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    const records: ClockCorrection[] = [];
    let trace = '';
    for (const { satellite } of mask.satellites()) {
      const c0 = readScaled(cursor, FIELDS.cssrClock);
      records.push({ kind: 'clock', satellite, c0 });
      trace += `${this.label} ${satellite} d_clock=${formatFixed(c0, 7, 3)}m\n`;
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, 0) };
  }
}
