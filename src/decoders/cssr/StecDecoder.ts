import type { BitCursor } from '../../BitCursor';
import type { MaskContext } from '../../mask/MaskContext';
import type { StecCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, isSelected, readSubsetMasks, usageOf } from '../Decoder';
import { formatStecPolynomial, readStecPolynomial } from './stec';

/** CSSR subtype 8: STEC polynomial per network satellite. */
export class StecDecoder extends MaskedDecoder {
  readonly label = 'ST8';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    const correctionType = cursor.readUnsigned(2);
    const networkId = cursor.readUnsigned(5);
    const other = cursor.offset - start;
    const subset = readSubsetMasks(cursor, mask);

    const records: StecCorrection[] = [];
    let trace = '';
    for (const ref of mask.satellites()) {
      if (!isSelected(subset, ref)) continue;
      const quality = cursor.readUnsigned(6);
      const polynomial = readStecPolynomial(cursor, correctionType);
      records.push({
        kind: 'stec',
        satellite: ref.satellite,
        networkId,
        quality,
        correctionType,
        polynomial,
      });
      trace += `${this.label} ${ref.satellite} ${formatStecPolynomial(polynomial)}\n`;
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, other) };
  }
}
