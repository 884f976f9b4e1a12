import type { BitCursor } from '../../BitCursor';
import { satelliteName } from '../../fields/FieldCodec';
import { GPS_PI, type EphemerisDecoder, type EphemerisResult, type NavicEphemeris } from './types';

/** RTCM 1041. The harmonic terms are 15 bits wide, with IRNSS ICD factors. */
export class NavicEphemerisDecoder implements EphemerisDecoder<NavicEphemeris> {
  readonly satsys = 'I';
  readonly bitLength = 470;

  decode(cursor: BitCursor): EphemerisResult<NavicEphemeris> {
    const svid = cursor.readUnsigned(6);
    const weekNumber = cursor.readUnsigned(10);
    const af0 = cursor.readSigned(22) * 2 ** -31;
    const af1 = cursor.readSigned(16) * 2 ** -43;
    const af2 = cursor.readSigned(8) * 2 ** -55;
    const ura = cursor.readUnsigned(4);
    const toc = cursor.readUnsigned(16) * 16;
    const tgd = cursor.readSigned(8) * 2 ** -31;
    const deltaN = cursor.readSigned(22) * 2 ** -41 * GPS_PI;
    const iodec = cursor.readUnsigned(8);
    cursor.skip(10);
    const l5Unhealthy = cursor.readBit() === 1;
    const sUnhealthy = cursor.readBit() === 1;
    const cuc = cursor.readSigned(15) * 2 ** -28;
    const cus = cursor.readSigned(15) * 2 ** -28;
    const cic = cursor.readSigned(15) * 2 ** -28;
    const cis = cursor.readSigned(15) * 2 ** -28;
    const crc = cursor.readSigned(15) * 2 ** -4;
    const crs = cursor.readSigned(15) * 2 ** -4;
    const idot = cursor.readSigned(14) * 2 ** -43 * GPS_PI;
    const m0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const toe = cursor.readUnsigned(16) * 16;
    const e = cursor.readUnsigned(32) * 2 ** -33;
    const sqrtA = cursor.readUnsigned(32) * 2 ** -19;
    const omega0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const omega = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const omegaDot = cursor.readSigned(22) * 2 ** -41 * GPS_PI;
    const i0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    cursor.skip(4);

    const record: NavicEphemeris = {
      satsys: 'I', svid, weekNumber, af0, af1, af2, ura, toc, tgd, deltaN, iodec, l5Unhealthy,
      sUnhealthy, cuc, cus, cic, cis, crc, crs, idot, m0, toe, e, sqrtA, omega0, omega,
      omegaDot, i0,
    };
    const unhealthy = [l5Unhealthy ? ' L5' : '', sUnhealthy ? ' S' : ''].join('');
    return {
      record,
      health: {
        healthy: unhealthy === '',
        annotations: unhealthy === '' ? [] : [`unhealthy${unhealthy}`],
      },
    };
  }

  summarize({ record, health }: EphemerisResult<NavicEphemeris>): string {
    return [
      `${satelliteName('I', record.svid)} WN=${record.weekNumber}`,
      `IODEC=${String(record.iodec).padEnd(4)}`,
      ...health.annotations,
    ].join(' ');
  }
}
