import type { BitCursor } from '../../BitCursor';
import { SequencingError } from '../../errors';
import { gnssIdToSatsys } from '../../fields/FieldCodec';
import type { MaskContext } from '../../mask/MaskContext';
import type { ClockCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import {
  MaskedDecoder,
  formatValidityInterval,
  readValidityInterval,
  usageOf,
} from '../Decoder';
import { formatHasClock, readHasClock } from './clock';

/**
 * HAS clock subset: up to four systems, each with its own multiplier and a
 * submask over that system's mask satellites.
 */
export class ClockSubsetDecoder extends MaskedDecoder {
  readonly label = 'CKSUB';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    cursor.require(4 + 2);
    const vi = readValidityInterval(cursor);
    const other = cursor.offset - start;
    const subsets = cursor.readUnsigned(2) + 1;
    let trace = `${formatValidityInterval(this.label, vi)}, n_sub=${subsets}\n`;

    const records: ClockCorrection[] = [];
    for (let i = 0; i < subsets; i++) {
      cursor.require(4 + 2);
      const satsys = gnssIdToSatsys(cursor.readUnsigned(4));
      const multiplier = cursor.readUnsigned(2) + 1;
      const system = mask.system(satsys);
      if (system === undefined) {
        throw new SequencingError(`clock subset for ${satsys}, which the mask does not list`);
      }
      const submask = cursor.readFlags(system.satellites.length);
      system.satellites.forEach((satellite, satIndex) => {
        if (!submask[satIndex]) return;
        const record = readHasClock(cursor, satellite, multiplier);
        records.push(record);
        trace += `${this.label} ${formatHasClock(record)} (x${multiplier})\n`;
      });
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, other) };
  }
}
