import type { BitCursor } from '../../BitCursor';
import { satelliteName } from '../../fields/FieldCodec';
import { formatHex } from '../../helpers';
import { GPS_PI, type EphemerisDecoder, type EphemerisResult, type GpsEphemeris } from './types';

const L2_CODES: Record<number, string> = { 1: 'L2P', 2: 'L2C/A', 3: 'L2C' };

/** RTCM 1019. */
export class GpsEphemerisDecoder implements EphemerisDecoder<GpsEphemeris> {
  readonly satsys = 'G';
  readonly bitLength = 476;

  decode(cursor: BitCursor): EphemerisResult<GpsEphemeris> {
    const svid = cursor.readUnsigned(6);
    const weekNumber = cursor.readUnsigned(10);
    const accuracy = cursor.readUnsigned(4);
    const l2Code = cursor.readUnsigned(2);
    const idot = cursor.readSigned(14) * 2 ** -43 * GPS_PI;
    const iode = cursor.readUnsigned(8);
    const toc = cursor.readUnsigned(16) * 16;
    const af2 = cursor.readSigned(8) * 2 ** -59;
    const af1 = cursor.readSigned(16) * 2 ** -46;
    const af0 = cursor.readSigned(22) * 2 ** -34;
    const iodc = cursor.readUnsigned(10);
    const crs = cursor.readSigned(16) * 2 ** -5;
    const deltaN = cursor.readSigned(16) * 2 ** -43 * GPS_PI;
    const m0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const cuc = cursor.readSigned(16) * 2 ** -29;
    const e = cursor.readUnsigned(32) * 2 ** -33;
    const cus = cursor.readSigned(16) * 2 ** -29;
    const sqrtA = cursor.readUnsigned(32) * 2 ** -19;
    const toe = cursor.readUnsigned(16) * 16;
    const cic = cursor.readSigned(16) * 2 ** -29;
    const omega0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const cis = cursor.readSigned(16) * 2 ** -29;
    const i0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const crc = cursor.readSigned(16) * 2 ** -5;
    const omega = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const omegaDot = cursor.readSigned(24) * 2 ** -43 * GPS_PI;
    const tgd = cursor.readSigned(8) * 2 ** -31;
    const health = cursor.readUnsigned(6);
    const l2pDataFlag = cursor.readUnsigned(1);
    const fitInterval = cursor.readUnsigned(1);

    const record: GpsEphemeris = {
      satsys: 'G', svid, weekNumber, accuracy, l2Code, idot, iode, toc, af2, af1, af0, iodc,
      crs, deltaN, m0, cuc, e, cus, sqrtA, toe, cic, omega0, cis, i0, crc, omega, omegaDot,
      tgd, health, l2pDataFlag, fitInterval,
    };
    return {
      record,
      health: {
        healthy: health === 0,
        annotations: health === 0 ? [] : [`unhealthy(${formatHex(health)})`],
      },
    };
  }

  summarize({ record, health }: EphemerisResult<GpsEphemeris>): string {
    const l2 = L2_CODES[record.l2Code] ?? `reserved L2 code(${record.l2Code})`;
    return [
      `${satelliteName('G', record.svid)} WN=${record.weekNumber}`,
      `IODE=${String(record.iode).padEnd(4)}`,
      `IODC=${String(record.iodc).padEnd(4)}`,
      l2,
      ...health.annotations,
    ].join(' ');
  }
}
