import type { BitCursor } from '../../BitCursor';
import { satelliteName } from '../../fields/FieldCodec';
import { GPS_PI, type BeidouEphemeris, type EphemerisDecoder, type EphemerisResult } from './types';

/** RTCM 1042. Factors follow the BDS open service ICD. */
export class BeidouEphemerisDecoder implements EphemerisDecoder<BeidouEphemeris> {
  readonly satsys = 'C';
  readonly bitLength = 499;

  decode(cursor: BitCursor): EphemerisResult<BeidouEphemeris> {
    const svid = cursor.readUnsigned(6);
    const weekNumber = cursor.readUnsigned(13);
    const urai = cursor.readUnsigned(4);
    const idot = cursor.readSigned(14) * 2 ** -43 * GPS_PI;
    const aode = cursor.readUnsigned(5);
    const toc = cursor.readUnsigned(17) * 8;
    const a2 = cursor.readSigned(11) * 2 ** -66;
    const a1 = cursor.readSigned(22) * 2 ** -50;
    const a0 = cursor.readSigned(24) * 2 ** -33;
    const aodc = cursor.readUnsigned(5);
    const crs = cursor.readSigned(18) * 2 ** -6;
    const deltaN = cursor.readSigned(16) * 2 ** -43 * GPS_PI;
    const m0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const cuc = cursor.readSigned(18) * 2 ** -31;
    const e = cursor.readUnsigned(32) * 2 ** -33;
    const cus = cursor.readSigned(18) * 2 ** -31;
    const sqrtA = cursor.readUnsigned(32) * 2 ** -19;
    const toe = cursor.readUnsigned(17) * 8;
    const cic = cursor.readSigned(18) * 2 ** -31;
    const omega0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const cis = cursor.readSigned(18) * 2 ** -31;
    const i0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const crc = cursor.readSigned(18) * 2 ** -6;
    const omega = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const omegaDot = cursor.readSigned(24) * 2 ** -43 * GPS_PI;
    // 0.1 ns
    const tgd1 = cursor.readSigned(10) * 1e-10;
    const tgd2 = cursor.readSigned(10) * 1e-10;
    const health = cursor.readUnsigned(1);

    const record: BeidouEphemeris = {
      satsys: 'C', svid, weekNumber, urai, idot, aode, toc, a2, a1, a0, aodc, crs, deltaN, m0,
      cuc, e, cus, sqrtA, toe, cic, omega0, cis, i0, crc, omega, omegaDot, tgd1, tgd2, health,
    };
    return {
      record,
      health: { healthy: health === 0, annotations: health === 0 ? [] : ['unhealthy'] },
    };
  }

  summarize({ record, health }: EphemerisResult<BeidouEphemeris>): string {
    return [
      `${satelliteName('C', record.svid)} WN=${record.weekNumber} AODE=${record.aode}`,
      ...health.annotations,
    ].join(' ');
  }
}
