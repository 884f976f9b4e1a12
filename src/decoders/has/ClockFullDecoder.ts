import type { BitCursor } from '../../BitCursor';
import { FIELDS } from '../../fields/FieldCodec';
import type { MaskContext } from '../../mask/MaskContext';
import type { ClockCorrection, SatSys } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import {
  MaskedDecoder,
  formatValidityInterval,
  readValidityInterval,
  usageOf,
} from '../Decoder';
import { formatHasClock, readHasClock } from './clock';

/** HAS clock full-set: a multiplier per system, then a clock correction per mask satellite. */
export class ClockFullDecoder extends MaskedDecoder {
  readonly label = 'CKFUL';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    let trace = formatValidityInterval(this.label, readValidityInterval(cursor)) + '\n';
    const other = cursor.offset - start;

    cursor.require(2 * mask.systems.length);
    const multipliers = new Map<SatSys, number>();
    for (const system of mask.systems) {
      multipliers.set(system.satsys, cursor.readUnsigned(2) + 1);
    }
    cursor.require(FIELDS.hasClock.width * mask.satelliteCount);
    const records: ClockCorrection[] = [];
    for (const { system, satellite } of mask.satellites()) {
      const multiplier = multipliers.get(system.satsys) ?? 1;
      const record = readHasClock(cursor, satellite, multiplier);
      records.push(record);
      trace += `${this.label} ${formatHasClock(record)} (multiplier=${multiplier})\n`;
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, other) };
  }
}
