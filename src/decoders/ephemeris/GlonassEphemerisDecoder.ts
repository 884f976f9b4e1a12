import type { BitCursor } from '../../BitCursor';
import { satelliteName } from '../../fields/FieldCodec';
import { formatZeroPadded } from '../../helpers';
import type { EphemerisDecoder, EphemerisResult, GlonassEphemeris } from './types';

const KM = 1000;

/**
 * RTCM 1020. State vector and clock terms are sign-magnitude; widths below
 * include the sign bit.
 */
export class GlonassEphemerisDecoder implements EphemerisDecoder<GlonassEphemeris> {
  readonly satsys = 'R';
  readonly bitLength = 348;

  decode(cursor: BitCursor): EphemerisResult<GlonassEphemeris> {
    const svid = cursor.readUnsigned(6);
    const frequencyChannel = cursor.readUnsigned(5);
    const almanacHealth = cursor.readUnsigned(1);
    const almanacHealthAvailable = cursor.readUnsigned(1);
    const p1 = cursor.readUnsigned(2);
    const tk = {
      hours: cursor.readUnsigned(5),
      minutes: cursor.readUnsigned(6),
      seconds: cursor.readUnsigned(1) * 30,
    };
    const bn = cursor.readUnsigned(1);
    const p2 = cursor.readUnsigned(1);
    const tb = cursor.readUnsigned(7) * 15;

    const velocity: [number, number, number] = [0, 0, 0];
    const position: [number, number, number] = [0, 0, 0];
    const acceleration: [number, number, number] = [0, 0, 0];
    for (let axis = 0; axis < 3; axis++) {
      velocity[axis] = cursor.readSignMagnitude(24) * 2 ** -20 * KM;
      position[axis] = cursor.readSignMagnitude(27) * 2 ** -11 * KM;
      acceleration[axis] = cursor.readSignMagnitude(5) * 2 ** -30 * KM;
    }

    const p3 = cursor.readUnsigned(1);
    const gammaN = cursor.readSignMagnitude(11) * 2 ** -40;
    const p = cursor.readUnsigned(2);
    const in3 = cursor.readUnsigned(1);
    const tauN = cursor.readSignMagnitude(22) * 2 ** -30;
    const deltaTauN = cursor.readSignMagnitude(5) * 2 ** -30;
    const en = cursor.readUnsigned(5);
    const p4 = cursor.readUnsigned(1);
    const ft = cursor.readUnsigned(4);
    const nt = cursor.readUnsigned(11);
    const m = cursor.readUnsigned(2);
    const additionalDataAvailable = cursor.readUnsigned(1);
    const na = cursor.readUnsigned(11);
    const tauC = cursor.readSignMagnitude(32) * 2 ** -31;
    const n4 = cursor.readUnsigned(5);
    const tauGps = cursor.readSignMagnitude(22) * 2 ** -30;
    const in5 = cursor.readUnsigned(1);
    cursor.skip(7);

    const record: GlonassEphemeris = {
      satsys: 'R', svid, frequencyChannel, almanacHealth, almanacHealthAvailable, p1, tk, bn,
      p2, tb, position, velocity, acceleration, p3, gammaN, p, in3, tauN, deltaTauN, en, p4,
      ft, nt, m, additionalDataAvailable, na, tauC, n4, tauGps, in5,
    };
    return {
      record,
      health: {
        healthy: almanacHealth === 0,
        annotations: almanacHealth === 0 ? [] : ['unhealthy'],
      },
    };
  }

  summarize({ record, health }: EphemerisResult<GlonassEphemeris>): string {
    const { hours, minutes, seconds } = record.tk;
    const tk = [hours, minutes, seconds].map(v => formatZeroPadded(v, 2)).join(':');
    return [
      `${satelliteName('R', record.svid)} f=${formatZeroPadded(record.frequencyChannel, 2)}`,
      `tk=${tk} tb=${record.tb}min`,
      ...health.annotations,
    ].join(' ');
  }
}
