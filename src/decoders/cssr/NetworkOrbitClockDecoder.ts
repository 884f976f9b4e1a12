import type { BitCursor } from '../../BitCursor';
import { FIELDS, readScaled } from '../../fields/FieldCodec';
import { formatFixed, formatInt } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { CorrectionRecord } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, iodeWidth, isSelected, readSubsetMasks, usageOf } from '../Decoder';

const onOff = (flag: boolean): string => (flag ? 'on' : 'off');

/**
 * CSSR subtype 11: network orbit and/or clock corrections. Without the
 * network flag the message carries no satellite data.
 */
export class NetworkOrbitClockDecoder extends MaskedDecoder {
  readonly label = 'ST11';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    const [hasOrbit, hasClock, hasNetwork] = cursor.readFlags(3);
    let trace =
      `${this.label} Orb=${onOff(hasOrbit)} Clk=${onOff(hasClock)} Net=${onOff(hasNetwork)}\n`;
    const records: CorrectionRecord[] = [];
    let other = 3;
    if (hasNetwork) {
      const networkId = cursor.readUnsigned(5);
      other += 5;
      trace += `${this.label} NID=${networkId}\n`;
      const subset = readSubsetMasks(cursor, mask);
      for (const ref of mask.satellites()) {
        if (!isSelected(subset, ref)) continue;
        const { satellite } = ref;
        trace += `${this.label} ${satellite}`;
        if (hasOrbit) {
          const bw = iodeWidth(ref.system.satsys);
          cursor.require(
            bw + FIELDS.cssrOrbitRadial.width + FIELDS.cssrOrbitAlong.width + FIELDS.cssrOrbitCross.width,
          );
          const iode = cursor.readUnsigned(bw);
          const radial = readScaled(cursor, FIELDS.cssrOrbitRadial);
          const along = readScaled(cursor, FIELDS.cssrOrbitAlong);
          const cross = readScaled(cursor, FIELDS.cssrOrbitCross);
          records.push({ kind: 'orbit', satellite, iode, radial, along, cross, networkId });
          trace +=
            ` IODE=${formatInt(iode, 4)}` +
            ` d_radial=${formatFixed(radial, 7, 4)}m` +
            ` d_along=${formatFixed(along, 7, 4)}m` +
            ` d_cross=${formatFixed(cross, 7, 4)}m`;
        }
        if (hasClock) {
          const c0 = readScaled(cursor, FIELDS.cssrClock);
          records.push({ kind: 'clock', satellite, c0, networkId });
          trace += ` c0=${formatFixed(c0, 7, 3)}m`;
        }
        trace += '\n';
      }
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, other) };
  }
}
