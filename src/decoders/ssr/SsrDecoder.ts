import type { BitCursor } from '../../BitCursor';
import { type ScaledField, satelliteName, signalName, uraMeters } from '../../fields/FieldCodec';
import { formatFixed, formatInt, formatZeroPadded } from '../../helpers';
import type {
  ClockCorrection,
  CorrectionRecord,
  OrbitCorrection,
  SatSys,
} from '../../types';
import { type DecodeResult, guard, ok } from '../DecodeResult';
import { iodeWidth } from '../Decoder';

export type SsrMessageKind =
  | 'orbit'
  | 'clock'
  | 'code-bias'
  | 'orbit-clock'
  | 'ura'
  | 'high-rate-clock';

export interface SsrHeader {
  epoch: number;
  interval: number;
  multipleMessage: boolean;
  /** Orbit and combined messages only: 0 ITRF, 1 regional. */
  satelliteReferenceDatum?: number;
  iod: number;
  providerId: number;
  solutionId: number;
  satelliteCount: number;
}

export interface SsrMessage {
  satsys: SatSys;
  kind: SsrMessageKind;
  header: SsrHeader;
  records: CorrectionRecord[];
}

// RTCM SSR fields carry no "not available" value.
const ORBIT = {
  radial: { width: 22, scale: 1e-4 },
  along: { width: 20, scale: 4e-4 },
  cross: { width: 20, scale: 4e-4 },
  dotRadial: { width: 21, scale: 1e-6 },
  dotAlong: { width: 19, scale: 4e-6 },
  dotCross: { width: 19, scale: 4e-6 },
} as const satisfies Record<string, ScaledField>;

const CLOCK = {
  c0: { width: 22, scale: 1e-4 },
  c1: { width: 21, scale: 1e-6 },
  c2: { width: 27, scale: 2e-8 },
} as const satisfies Record<string, ScaledField>;

const CODE_BIAS: ScaledField = { width: 14, scale: 0.01 };
const HIGH_RATE_CLOCK: ScaledField = { width: 22, scale: 1e-4 };

function readField(cursor: BitCursor, field: ScaledField): number {
  return cursor.readSigned(field.width) * field.scale;
}

function satelliteIdWidth(satsys: SatSys): number {
  if (satsys === 'J') return 4;
  if (satsys === 'R') return 5;
  return 6;
}

export function decodeSsrHeader(cursor: BitCursor, satsys: SatSys, kind: SsrMessageKind): SsrHeader {
  const epoch = cursor.readUnsigned(satsys === 'R' ? 17 : 20);
  const interval = cursor.readUnsigned(4);
  const multipleMessage = cursor.readBit() === 1;
  const satelliteReferenceDatum =
    kind === 'orbit' || kind === 'orbit-clock' ? cursor.readUnsigned(1) : undefined;
  const iod = cursor.readUnsigned(4);
  const providerId = cursor.readUnsigned(16);
  const solutionId = cursor.readUnsigned(4);
  const satelliteCount = cursor.readUnsigned(satsys === 'J' ? 4 : 6);
  return {
    epoch,
    interval,
    multipleMessage,
    satelliteReferenceDatum,
    iod,
    providerId,
    solutionId,
    satelliteCount,
  };
}

function readOrbit(cursor: BitCursor, satsys: SatSys, satellite: string): OrbitCorrection {
  return {
    kind: 'orbit',
    satellite,
    iode: cursor.readUnsigned(iodeWidth(satsys)),
    radial: readField(cursor, ORBIT.radial),
    along: readField(cursor, ORBIT.along),
    cross: readField(cursor, ORBIT.cross),
    dotRadial: readField(cursor, ORBIT.dotRadial),
    dotAlong: readField(cursor, ORBIT.dotAlong),
    dotCross: readField(cursor, ORBIT.dotCross),
  };
}

function readClock(cursor: BitCursor, satellite: string): ClockCorrection {
  return {
    kind: 'clock',
    satellite,
    c0: readField(cursor, CLOCK.c0),
    c1: readField(cursor, CLOCK.c1),
    c2: readField(cursor, CLOCK.c2),
  };
}

function formatSsrOrbit(r: OrbitCorrection): string {
  const m = (v: number | null | undefined): string => formatFixed(v ?? null, 7, 4);
  return (
    `${r.satellite} IODE=${formatInt(r.iode, 4)}` +
    ` d_radial=${m(r.radial)}m d_along=${m(r.along)}m d_cross=${m(r.cross)}m` +
    ` dot_d_radial=${m(r.dotRadial)}m/s dot_d_along=${m(r.dotAlong)}m/s dot_d_cross=${m(r.dotCross)}m/s`
  );
}

function formatSsrClock(r: ClockCorrection): string {
  const m = (v: number | null | undefined): string => formatFixed(v ?? null, 7, 3);
  return `${r.satellite} c0=${m(r.c0)}m c1=${m(r.c1)}m/s c2=${m(r.c2)}m/s^2`;
}

/**
 * Decode an RTCM SSR message body (orbit, clock, code bias, combined
 * orbit/clock, URA, high-rate clock) for one satellite system.
 */
export function decodeSsr(
  cursor: BitCursor,
  satsys: SatSys,
  kind: SsrMessageKind,
): DecodeResult<SsrMessage> {
  return guard(() => {
    const start = cursor.offset;
    const header = decodeSsrHeader(cursor, satsys, kind);
    const idWidth = satelliteIdWidth(satsys);
    const records: CorrectionRecord[] = [];
    const satellites: string[] = [];
    let trace = '';
    for (let i = 0; i < header.satelliteCount; i++) {
      const satellite = satelliteName(satsys, cursor.readUnsigned(idWidth));
      satellites.push(satellite);
      switch (kind) {
        case 'orbit': {
          const orbit = readOrbit(cursor, satsys, satellite);
          records.push(orbit);
          trace += formatSsrOrbit(orbit) + '\n';
          break;
        }
        case 'clock': {
          const clock = readClock(cursor, satellite);
          records.push(clock);
          trace += formatSsrClock(clock) + '\n';
          break;
        }
        case 'orbit-clock': {
          const orbit = readOrbit(cursor, satsys, satellite);
          const clock = readClock(cursor, satellite);
          records.push(orbit, clock);
          trace += formatSsrOrbit(orbit) + '\n' + formatSsrClock(clock) + '\n';
          break;
        }
        case 'code-bias': {
          const count = cursor.readUnsigned(5);
          for (let j = 0; j < count; j++) {
            const signal = signalName(satsys, cursor.readUnsigned(5));
            const bias = readField(cursor, CODE_BIAS);
            records.push({ kind: 'code-bias', satellite, signal, bias });
            trace += `${satellite} ${signal.padEnd(13)} code_bias=${formatFixed(bias, 7, 3)}m\n`;
          }
          break;
        }
        case 'ura': {
          const raw = cursor.readUnsigned(6);
          records.push({ kind: 'ura', satellite, raw, meters: uraMeters(raw) });
          trace += `${satellite} ura=${formatZeroPadded(raw, 2)}\n`;
          break;
        }
        case 'high-rate-clock': {
          const clock = readField(cursor, HIGH_RATE_CLOCK);
          records.push({ kind: 'high-rate-clock', satellite, clock });
          trace += `${satellite} high_rate_clock=${formatFixed(clock, 7, 3)}m\n`;
          break;
        }
      }
    }
    const summary =
      `${satellites.join(' ')} (nsat=${header.satelliteCount} iod=${header.iod}` +
      `${header.multipleMessage ? ' cont.' : ''})`;
    return ok({
      message: { satsys, kind, header, records },
      summary,
      trace,
      bitLength: cursor.offset - start,
    });
  });
}
