import type { BitCursor } from '../../BitCursor';
import { FIELDS, type ScaledField, readScaled } from '../../fields/FieldCodec';
import { formatFixed, formatInt } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { OrbitCorrection } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import {
  MaskedDecoder,
  formatValidityInterval,
  iodeWidth,
  readValidityInterval,
  usageOf,
} from '../Decoder';

export interface OrbitDecoderOptions {
  label: string;
  radial: ScaledField;
  along: ScaledField;
  cross: ScaledField;
  /** Trace name of the along-track component. */
  alongName?: string;
  /** Body starts with a HAS validity interval. */
  validityInterval?: boolean;
}

/** Orbit corrections, one per mask satellite (CSSR subtype 2, HAS orbit block). */
export class OrbitDecoder extends MaskedDecoder {
  readonly label: string;
  private readonly options: OrbitDecoderOptions;

  constructor(options: OrbitDecoderOptions) {
    super();
    this.label = options.label;
    this.options = options;
  }

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const { radial, along, cross, alongName = 'd_along' } = this.options;
    const start = cursor.offset;
    let trace = '';
    let other = 0;
    if (this.options.validityInterval) {
      trace += formatValidityInterval(this.label, readValidityInterval(cursor)) + '\n';
      other = cursor.offset - start;
    }
    const records: OrbitCorrection[] = [];
    for (const { system, satellite } of mask.satellites()) {
      const bw = iodeWidth(system.satsys);
      cursor.require(bw + radial.width + along.width + cross.width);
      const record: OrbitCorrection = {
        kind: 'orbit',
        satellite,
        iode: cursor.readUnsigned(bw),
        radial: readScaled(cursor, radial),
        along: readScaled(cursor, along),
        cross: readScaled(cursor, cross),
      };
      records.push(record);
      trace += `${this.label} ${formatOrbit(record, alongName)}\n`;
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, other) };
  }
}

/** `G01 IODE=   5 d_radial= 0.0016m d_along= ...` */
export function formatOrbit(record: OrbitCorrection, alongName = 'd_along'): string {
  return (
    `${record.satellite} IODE=${formatInt(record.iode, 4)} ` +
    `d_radial=${formatFixed(record.radial, 7, 4)}m ` +
    `${alongName}=${formatFixed(record.along, 7, 4)}m ` +
    `d_cross=${formatFixed(record.cross, 7, 4)}m`
  );
}

export const cssrOrbitDecoder = new OrbitDecoder({
  label: 'ST2',
  radial: FIELDS.cssrOrbitRadial,
  along: FIELDS.cssrOrbitAlong,
  cross: FIELDS.cssrOrbitCross,
});
