import type { BitCursor } from '../../BitCursor';
import { uraMeters } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { UraCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, usageOf } from '../Decoder';

/** CSSR subtype 7: 6-bit user range accuracy per mask satellite. */
export class UraDecoder extends MaskedDecoder {
  readonly label = 'ST7';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    const records: UraCorrection[] = [];
    let trace = '';
    for (const { satellite } of mask.satellites()) {
      const raw = cursor.readUnsigned(6);
      const meters = uraMeters(raw);
      records.push({ kind: 'ura', satellite, raw, meters });
      trace += `${this.label} ${satellite} URA ${raw} ${formatFixed(meters, 7, 4)}m\n`;
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, 0) };
  }
}
