import type { BitCursor } from '../../BitCursor';
import { satelliteName } from '../../fields/FieldCodec';
import { GPS_PI, type EphemerisDecoder, type EphemerisResult, type HealthStatus, type QzssEphemeris } from './types';

/** Signals named by health bits 1..5 (bit 0 is the L1 summary). */
const HEALTH_SIGNALS = ['L1C/A', 'L2C', 'L5', 'L1C', 'L1C/B'];

/**
 * Interpret the 6-bit QZSS health word (IS-QZSS-PNT 4.1.2.3). The satellite
 * is unhealthy when the L1 bit or any of L2C, L5, L1C is set. A healthy L1
 * with the L1C/A or L1C/B bit set tells which of the two is transmitted.
 */
export function qzssHealth(health: number): HealthStatus {
  const bit = (i: number): boolean => ((health >> (5 - i)) & 1) === 1;
  if (bit(0) || bit(2) || bit(3) || bit(4)) {
    const signals = HEALTH_SIGNALS.filter((_, i) => bit(i + 1));
    return { healthy: false, annotations: [`unhealthy (${signals.join(' ')})`] };
  }
  const annotations: string[] = [];
  if (bit(1)) annotations.push('L1C/B');
  if (bit(5)) annotations.push('L1C/A');
  return { healthy: true, annotations };
}

/** RTCM 1044. */
export class QzssEphemerisDecoder implements EphemerisDecoder<QzssEphemeris> {
  readonly satsys = 'J';
  readonly bitLength = 473;

  decode(cursor: BitCursor): EphemerisResult<QzssEphemeris> {
    const svid = cursor.readUnsigned(4);
    const toc = cursor.readUnsigned(16) * 16;
    const af2 = cursor.readSigned(8) * 2 ** -59;
    const af1 = cursor.readSigned(16) * 2 ** -46;
    const af0 = cursor.readSigned(22) * 2 ** -34;
    const iode = cursor.readUnsigned(8);
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
    const idot = cursor.readSigned(14) * 2 ** -43 * GPS_PI;
    const l2Code = cursor.readUnsigned(2);
    const weekNumber = cursor.readUnsigned(10);
    const ura = cursor.readUnsigned(4);
    const health = cursor.readUnsigned(6);
    const tgd = cursor.readSigned(8) * 2 ** -31;
    const iodc = cursor.readUnsigned(10);
    const fitInterval = cursor.readUnsigned(1);

    const record: QzssEphemeris = {
      satsys: 'J', svid, toc, af2, af1, af0, iode, crs, deltaN, m0, cuc, e, cus, sqrtA, toe,
      cic, omega0, cis, i0, crc, omega, omegaDot, idot, l2Code, weekNumber, ura, health, tgd,
      iodc, fitInterval,
    };
    return { record, health: qzssHealth(health) };
  }

  summarize({ record, health }: EphemerisResult<QzssEphemeris>): string {
    return [
      `${satelliteName('J', record.svid)} WN=${record.weekNumber}`,
      `IODE=${String(record.iode).padEnd(4)}`,
      `IODC=${String(record.iodc).padEnd(4)}`,
      ...health.annotations,
    ].join(' ');
  }
}
