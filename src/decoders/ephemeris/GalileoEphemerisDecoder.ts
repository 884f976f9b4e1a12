import type { BitCursor } from '../../BitCursor';
import { satelliteName } from '../../fields/FieldCodec';
import {
  GPS_PI,
  type EphemerisDecoder,
  type EphemerisResult,
  type GalileoEphemeris,
  type GalileoNavMessage,
} from './types';

/**
 * RTCM 1045 (F/NAV) and 1046 (I/NAV). The two share the orbit and clock
 * block and differ in the group delay and signal health tail.
 */
export class GalileoEphemerisDecoder implements EphemerisDecoder<GalileoEphemeris> {
  readonly satsys = 'E';
  readonly navMessage: GalileoNavMessage;
  readonly bitLength: number;

  constructor(navMessage: GalileoNavMessage) {
    this.navMessage = navMessage;
    this.bitLength = navMessage === 'F/NAV' ? 484 : 492;
  }

  decode(cursor: BitCursor): EphemerisResult<GalileoEphemeris> {
    const svid = cursor.readUnsigned(6);
    const weekNumber = cursor.readUnsigned(12);
    const iodNav = cursor.readUnsigned(10);
    const sisa = cursor.readUnsigned(8);
    const idot = cursor.readSigned(14) * 2 ** -43 * GPS_PI;
    const toc = cursor.readUnsigned(14) * 60;
    const af2 = cursor.readSigned(6) * 2 ** -59;
    const af1 = cursor.readSigned(21) * 2 ** -46;
    const af0 = cursor.readSigned(31) * 2 ** -34;
    const crs = cursor.readSigned(16) * 2 ** -5;
    const deltaN = cursor.readSigned(16) * 2 ** -43 * GPS_PI;
    const m0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const cuc = cursor.readSigned(16) * 2 ** -29;
    const e = cursor.readUnsigned(32) * 2 ** -33;
    const cus = cursor.readSigned(16) * 2 ** -29;
    const sqrtA = cursor.readUnsigned(32) * 2 ** -19;
    const toe = cursor.readUnsigned(14) * 60;
    const cic = cursor.readSigned(16) * 2 ** -29;
    const omega0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const cis = cursor.readSigned(16) * 2 ** -29;
    const i0 = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const crc = cursor.readSigned(16) * 2 ** -5;
    const omega = cursor.readSigned(32) * 2 ** -31 * GPS_PI;
    const omegaDot = cursor.readSigned(24) * 2 ** -43 * GPS_PI;
    const bgdE5aE1 = cursor.readSigned(10) * 2 ** -32;

    const record: GalileoEphemeris = {
      satsys: 'E', navMessage: this.navMessage, svid, weekNumber, iodNav, sisa, idot, toc,
      af2, af1, af0, crs, deltaN, m0, cuc, e, cus, sqrtA, toe, cic, omega0, cis, i0, crc,
      omega, omegaDot, bgdE5aE1, signals: [],
    };
    if (this.navMessage === 'F/NAV') {
      record.signals.push(readSignalStatus(cursor, 'OS'));
      cursor.skip(7);
    } else {
      record.bgdE5bE1 = cursor.readSigned(10) * 2 ** -32;
      record.signals.push(readSignalStatus(cursor, 'E5b'), readSignalStatus(cursor, 'E1b'));
      cursor.skip(2);
    }

    const annotations: string[] = [];
    for (const { signal, health, dataInvalid } of record.signals) {
      if (health !== 0) annotations.push(`unhealthy ${signal} (${health})`);
      if (dataInvalid) annotations.push(`invalid ${signal}`);
    }
    return { record, health: { healthy: annotations.length === 0, annotations } };
  }

  summarize({ record, health }: EphemerisResult<GalileoEphemeris>): string {
    return [
      `${satelliteName('E', record.svid)} WN=${record.weekNumber} IODnav=${record.iodNav}`,
      ...health.annotations,
    ].join(' ');
  }
}

function readSignalStatus(
  cursor: BitCursor,
  signal: GalileoEphemeris['signals'][number]['signal'],
): GalileoEphemeris['signals'][number] {
  const health = cursor.readUnsigned(2);
  const dataInvalid = cursor.readBit() === 1;
  return { signal, health, dataInvalid };
}
